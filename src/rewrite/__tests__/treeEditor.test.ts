import type { SyntaxTree, TypeDecl } from '../../syntax/model';
import { loadCSharpParser, type CSharpParser } from '../../syntax/parser';
import { findField, findMethod } from '../../syntax/query';
import { memberHeadRef, memberRef, removeFieldEdit, singleLine, tokenRef, type NewNode } from '../edits';
import { applyEdits, EditConflictError, TreeEditor } from '../treeEditor';

const cs = (...lines: string[]): string => lines.join('\n') + '\n';

let parser: CSharpParser;

beforeAll(async () => {
  parser = await loadCSharpParser();
});

function classOf(tree: SyntaxTree): TypeDecl {
  const t = tree.root.types[0];
  if (!t) throw new Error('no type');
  return t;
}

function field(tree: SyntaxTree, name: string) {
  const m = findField(classOf(tree), name);
  if (!m) throw new Error(`field ${name} not found`);
  return m;
}

function applied(editor: TreeEditor): string {
  const result = editor.materialize();
  if (result.kind !== 'applied') throw new Error(`stale: ${result.node.text}`);
  return result.text;
}

describe('TreeEditor removals', () => {
  test('removes a member between blank lines and keeps one separator', () => {
    const tree = parser.parse(cs('class A', '{', '    int _a;', '', '    int _b;', '', '    int _c;', '}'));
    const text = applied(new TreeEditor(tree).remove(memberRef(field(tree, '_b').field)));
    expect(text).toBe(cs('class A', '{', '    int _a;', '', '    int _c;', '}'));
  });

  test('removing the last member drops the blank line above it', () => {
    const tree = parser.parse(cs('class A', '{', '    int _a;', '', '    int _c;', '}'));
    const text = applied(new TreeEditor(tree).remove(memberRef(field(tree, '_c').field)));
    expect(text).toBe(cs('class A', '{', '    int _a;', '}'));
  });

  test('takes leading comments with the member', () => {
    const tree = parser.parse(cs('class A', '{', '    // counter', '    int _a;', '    int _b;', '}'));
    const text = applied(new TreeEditor(tree).remove(memberRef(field(tree, '_a').field)));
    expect(text).toBe(cs('class A', '{', '    int _b;', '}'));
  });

  test('removes one variable of a multi-variable field with its comma', () => {
    const source = cs('class A', '{', '    private string _first, _last;', '}');
    const tree = parser.parse(source);

    expect(applied(new TreeEditor(tree).apply([removeFieldEdit(field(tree, '_last'))]))).toBe(
      cs('class A', '{', '    private string _first;', '}'),
    );
    expect(applied(new TreeEditor(tree).apply([removeFieldEdit(field(tree, '_first'))]))).toBe(
      cs('class A', '{', '    private string _last;', '}'),
    );
  });

  test('removes a member that shares its line without leaving stray spaces', () => {
    const source = cs('class A', '{', '    private int _a; private int _b;', '}');
    const tree = parser.parse(source);

    expect(applied(new TreeEditor(tree).remove(memberRef(field(tree, '_b').field)))).toBe(
      cs('class A', '{', '    private int _a;', '}'),
    );
    expect(applied(new TreeEditor(tree).remove(memberRef(field(tree, '_a').field)))).toBe(
      cs('class A', '{', '    private int _b;', '}'),
    );
  });
});

describe('TreeEditor insertions and replacements', () => {
  test('prints a block with the anchor indentation, in tabs when the file uses tabs', () => {
    const tree = parser.parse(cs('class A', '{', '\tint _a;', '}'));
    const method: NewNode = {
      kind: 'method',
      lines: [
        { depth: 0, text: 'void M()' },
        { depth: 0, text: '{' },
        { depth: 1, text: 'Go();' },
        { depth: 0, text: '}' },
        { depth: 0, text: '' },
      ],
    };
    const text = applied(new TreeEditor(tree).insertBefore(memberRef(field(tree, '_a').field), method));
    expect(text).toBe(cs('class A', '{', '\tvoid M()', '\t{', '\t\tGo();', '\t}', '', '\tint _a;', '}'));
  });

  test('inserts inline after existing attributes', () => {
    const tree = parser.parse(cs('class A', '{', '    [Obsolete] void M() { }', '}'));
    const m = findMethod(classOf(tree), 'M');
    if (!m) throw new Error('no method');
    const text = applied(new TreeEditor(tree).insertBefore(memberHeadRef(m), singleLine('attribute', '[RelayCommand]')));
    expect(text).toBe(cs('class A', '{', '    [Obsolete] [RelayCommand] void M() { }', '}'));
  });

  test('replaces a name token in place', () => {
    const tree = parser.parse(cs('class A', '{', '    void ExecuteRun() { }', '}'));
    const m = findMethod(classOf(tree), 'ExecuteRun');
    if (!m) throw new Error('no method');
    const text = applied(new TreeEditor(tree).replace(tokenRef(m.nameToken), singleLine('identifier', 'Run')));
    expect(text).toBe(cs('class A', '{', '    void Run() { }', '}'));
  });

  test('keeps CRLF line endings', () => {
    const tree = parser.parse('class A\r\n{\r\n    int _a;\r\n}\r\n');
    const text = applied(new TreeEditor(tree).insertBefore(memberRef(field(tree, '_a').field), singleLine('attribute', '[X]')));
    expect(text).toBe('class A\r\n{\r\n    [X]\r\n    int _a;\r\n}\r\n');
  });
});

describe('TreeEditor imports', () => {
  const USINGS = cs('using System;', 'using System.ComponentModel;', '', 'class A { }');

  test('leaves an existing exact using alone', () => {
    const tree = parser.parse(USINGS);
    expect(applied(new TreeEditor(tree).ensureImport('System.ComponentModel'))).toBe(USINGS);
  });

  test('appends after the last using, once per namespace', () => {
    const tree = parser.parse(USINGS);
    const editor = new TreeEditor(tree).ensureImport('CommunityToolkit.Mvvm.Input').ensureImport('CommunityToolkit.Mvvm.Input');
    expect(applied(editor)).toBe(
      cs('using System;', 'using System.ComponentModel;', 'using CommunityToolkit.Mvvm.Input;', '', 'class A { }'),
    );
  });

  test('does not count aliases, static usings or parent namespaces', () => {
    const source = cs('using Input = CommunityToolkit.Mvvm.Input;', 'using static CommunityToolkit.Mvvm.Input;', 'using CommunityToolkit.Mvvm;', 'class A { }');
    const tree = parser.parse(source);
    expect(applied(new TreeEditor(tree).ensureImport('CommunityToolkit.Mvvm.Input'))).toBe(
      cs(
        'using Input = CommunityToolkit.Mvvm.Input;',
        'using static CommunityToolkit.Mvvm.Input;',
        'using CommunityToolkit.Mvvm;',
        'using CommunityToolkit.Mvvm.Input;',
        'class A { }',
      ),
    );
  });

  test('counts a using inside a namespace block', () => {
    const source = cs('namespace N', '{', '    using CommunityToolkit.Mvvm.Input;', '    class A { }', '}');
    const tree = parser.parse(source);
    expect(applied(new TreeEditor(tree).ensureImport('CommunityToolkit.Mvvm.Input'))).toBe(source);
  });

  test('adds the first using below the header comment', () => {
    const tree = parser.parse(cs('// header', 'class A { }'));
    expect(applied(new TreeEditor(tree).ensureImport('CommunityToolkit.Mvvm.Input'))).toBe(
      cs('// header', 'using CommunityToolkit.Mvvm.Input;', '', 'class A { }'),
    );
  });
});

describe('TreeEditor validation', () => {
  test('reports a reference that no longer matches the text as stale', () => {
    const before = parser.parse(cs('class A', '{', '    int _a;', '}'));
    const after = parser.parse(cs('class A', '{', '    long _a;', '}'));
    const ref = memberRef(field(before, '_a').field);

    expect(applyEdits(after, [{ kind: 'remove', node: ref }])).toEqual({ kind: 'stale', node: ref });
  });

  test('rejects overlapping edits from one plan', () => {
    const tree = parser.parse(cs('class A', '{', '    int _a;', '}'));
    const ref = memberRef(field(tree, '_a').field);
    expect(() => new TreeEditor(tree).remove(ref).remove(ref).materialize()).toThrow(EditConflictError);
  });
});
