import type { Edit } from '../rewrite/edits';
import type { Expression, MethodDecl, Span, TypeRef } from '../syntax/model';
import type { PropertyContext } from '../syntax/query';

export type RuleId = 'notified-setter' | 'simple-command-type' | 'delegate-command-type';

export type Severity = 'error' | 'warning' | 'info';

export type RuleDescriptor = {
  id: RuleId;
  title: string;
  description: string;
  /** `{0}` is replaced with the property name. */
  messageFormat: string;
  category: string;
  severity: Severity;
  /** False for rules that only flag code for manual migration. */
  fixable: boolean;
};

export type Finding = {
  ruleId: RuleId;
  severity: Severity;
  message: string;
  /** Span of the property's name token. */
  anchor: Span;
  /** 1-based line and column of `anchor.start`. */
  line: number;
  column: number;
  propertyName: string;
  containerName: string;
  /** Checksum of the document text the finding was computed from. */
  checksum: string;
  fixable: boolean;
};

export type NotifiedPropertyMatch = {
  kind: 'notifiedProperty';
  propertyName: string;
  propertyType: TypeRef;
  backingFieldName?: string;
  fieldInitializer?: Expression;
  /** Distinct names in first-seen order, never the property's own name. */
  notifyTargets: string[];
};

export type SimpleCommandMatch = {
  kind: 'simpleCommandProperty';
  propertyName: string;
  commandTypeName: string;
};

/** Execute logic of a lambda: a single expression, or the block as written. */
export type CommandBody =
  | { kind: 'expression'; text: string }
  | { kind: 'block'; text: string };

export type CommandParameter = { name: string; type: string };

export type DelegateCommandMatch = {
  kind: 'delegateCommandProperty';
  propertyName: string;
  backingFieldName?: string;
  executeMethod?: MethodDecl;
  canExecuteMethod?: MethodDecl;
  commandBody?: CommandBody;
  parameters: CommandParameter[];
  isAsync: boolean;
  canExecuteTargetName?: string;
  canExecuteMethodRemovable: boolean;
};

export type Match = NotifiedPropertyMatch | SimpleCommandMatch | DelegateCommandMatch;

/** Throws the abort reason when the caller cancelled; called between steps. */
export type Checkpoint = () => void;

export type Rule = {
  descriptor: RuleDescriptor;
  /** Pure shape test over one property. */
  detect(ctx: PropertyContext): boolean;
  /**
   * Re-derives the match from the given snapshot and plans its rewrite.
   * `undefined` means the finding stands but no fix can be built.
   */
  plan?(ctx: PropertyContext, checkpoint: Checkpoint): Edit[] | undefined;
};
