// Public library surface.

export const TOOL_NAME = 'mvvm-migrate';
export const VERSION = '0.1.0';

export * from './syntax/model';
export { CSharpSyntaxError, loadCSharpParser, type CSharpParser } from './syntax/parser';
export { resolvedTypeName } from './syntax/typeName';
export { findField, findMethod, findPropertyAt, propertiesOf, type PropertyContext } from './syntax/query';

export * from './rules/types';
export { RULES, RULE_IDS, getRule, isRuleId, ruleDescriptors } from './rules/registry';

export * from './rewrite/edits';
export { TreeEditor, EditConflictError, applyEdits, type MaterializeResult } from './rewrite/treeEditor';

export * from './engine/analyzeDocument';
export * from './engine/fixFinding';

export * from './config/loadConfig';
export * from './report/migrationReport';
export * from './report/writeReport';
export * from './scan/sourceScanner';
export * from './scan/inventory';
export * from './util/deterministicJson';
