import { loadCSharpParser, type CSharpParser } from '../../syntax/parser';
import { propertiesOf, type PropertyContext } from '../../syntax/query';
import { commandStem, relayMethodName } from '../commandNames';
import { commandValueExpression, delegateCommandTypeRule, extractDelegateCommand } from '../delegateCommandType';
import { matchSimpleCommand, simpleCommandTypeRule } from '../simpleCommandType';

const cs = (...lines: string[]): string => lines.join('\n') + '\n';

let parser: CSharpParser;

beforeAll(async () => {
  parser = await loadCSharpParser();
});

function ctxOf(source: string, name: string): PropertyContext {
  for (const ctx of propertiesOf(parser.parse(source))) {
    if (ctx.property.name === name) return ctx;
  }
  throw new Error(`property ${name} not found`);
}

describe('command naming', () => {
  test('strips a trailing case-sensitive Command suffix', () => {
    expect(commandStem('SaveCommand')).toBe('Save');
    expect(commandStem('Savecommand')).toBe('Savecommand');
    expect(commandStem('Command')).toBe('Command');
  });

  test('appends Async once for async commands', () => {
    expect(relayMethodName('Load', true)).toBe('LoadAsync');
    expect(relayMethodName('LoadAsync', true)).toBe('LoadAsync');
    expect(relayMethodName('Load', false)).toBe('Load');
  });
});

describe('simple-command-type', () => {
  const source = cs(
    'public class Shell',
    '{',
    '    public Command OpenCommand { get; }',
    '    public Xamarin.Forms.Command? CloseCommand { get; set; }',
    '    public ICommand OtherCommand { get; }',
    '}',
  );

  test('flags properties whose type resolves to Command', () => {
    expect(simpleCommandTypeRule.detect(ctxOf(source, 'OpenCommand'))).toBe(true);
    expect(matchSimpleCommand(ctxOf(source, 'CloseCommand'))).toEqual({
      kind: 'simpleCommandProperty',
      propertyName: 'CloseCommand',
      commandTypeName: 'Command',
    });
    expect(simpleCommandTypeRule.detect(ctxOf(source, 'OtherCommand'))).toBe(false);
  });

  test('offers no fix', () => {
    expect(simpleCommandTypeRule.plan).toBeUndefined();
    expect(simpleCommandTypeRule.descriptor.fixable).toBe(false);
  });
});

describe('delegate-command-type extraction', () => {
  test('reads the backing field and lambda from a coalescing expression body', () => {
    const source = cs(
      'public class Shell',
      '{',
      '    private DelegateCommand _cmd;',
      '    public DelegateCommand DoThingCommand => _cmd ?? (_cmd = new DelegateCommand(x => DoThing(x)));',
      '}',
    );
    const ctx = ctxOf(source, 'DoThingCommand');
    expect(delegateCommandTypeRule.detect(ctx)).toBe(true);

    const match = extractDelegateCommand(ctx);
    expect(match.backingFieldName).toBe('_cmd');
    expect(match.commandBody).toEqual({ kind: 'expression', text: 'DoThing(x)' });
    expect(match.parameters).toEqual([{ name: 'x', type: 'object' }]);
    expect(match.isAsync).toBe(false);
    expect(match.executeMethod).toBeUndefined();
    expect(match.canExecuteTargetName).toBeUndefined();
  });

  test('takes implicit parameter types from the generic arguments', () => {
    const source = cs(
      'public class Shell',
      '{',
      '    private DelegateCommand<string> _openCommand;',
      '    public DelegateCommand<string> OpenCommand',
      '    {',
      '        get { return _openCommand ??= new DelegateCommand<string>(async path => { await Open(path); }); }',
      '    }',
      '}',
    );
    const ctx = ctxOf(source, 'OpenCommand');
    expect(commandValueExpression(ctx.property)?.kind).toBe('assignment');

    const match = extractDelegateCommand(ctx);
    expect(match.backingFieldName).toBe('_openCommand');
    expect(match.parameters).toEqual([{ name: 'path', type: 'string' }]);
    expect(match.isAsync).toBe(true);
    expect(match.commandBody).toEqual({ kind: 'expression', text: 'await Open(path)' });
  });

  test('falls back to the conventional backing field name', () => {
    const source = cs(
      'public class Shell',
      '{',
      '    private DelegateCommand _refreshCommand;',
      '    public DelegateCommand RefreshCommand',
      '    {',
      '        get',
      '        {',
      '            if (_refreshCommand == null) _refreshCommand = new DelegateCommand(() => Refresh());',
      '            return _refreshCommand;',
      '        }',
      '    }',
      '}',
    );
    const match = extractDelegateCommand(ctxOf(source, 'RefreshCommand'));
    expect(match.backingFieldName).toBe('_refreshCommand');
    expect(match.parameters).toEqual([]);
    expect(match.commandBody).toEqual({ kind: 'expression', text: 'Refresh()' });
  });

  test('keeps a multi-statement lambda block whole', () => {
    const source = cs(
      'public class Shell',
      '{',
      '    public DelegateCommand ResetCommand { get; } = new DelegateCommand(() =>',
      '    {',
      '        Clear();',
      '        Reload();',
      '    });',
      '}',
    );
    const match = extractDelegateCommand(ctxOf(source, 'ResetCommand'));
    expect(match.backingFieldName).toBeUndefined();
    expect(match.commandBody).toEqual({ kind: 'block', text: '{\n        Clear();\n        Reload();\n    }' });
  });

  test('finds Execute/CanExecute methods and unwraps a field-returning guard', () => {
    const source = cs(
      'public class Shell',
      '{',
      '    private bool _enabled;',
      '    public DelegateCommand FooCommand => new DelegateCommand(ExecuteFoo, CanExecuteFoo);',
      '    private void ExecuteFoo() { }',
      '    private bool CanExecuteFoo() { return _enabled; }',
      '}',
    );
    const match = extractDelegateCommand(ctxOf(source, 'FooCommand'));
    expect(match.executeMethod?.name).toBe('ExecuteFoo');
    expect(match.canExecuteMethod?.name).toBe('CanExecuteFoo');
    expect(match.canExecuteTargetName).toBe('_enabled');
    expect(match.canExecuteMethodRemovable).toBe(true);
    expect(match.commandBody).toBeUndefined();
  });

  test('keeps a guard with extra logic and references it by name', () => {
    const source = cs(
      'public class Shell',
      '{',
      '    public DelegateCommand FooCommand => new DelegateCommand(ExecuteFooCommand, CanExecuteFooCommand);',
      '    private void ExecuteFooCommand() { }',
      '    private bool CanExecuteFooCommand() => _enabled && !_busy;',
      '}',
    );
    const match = extractDelegateCommand(ctxOf(source, 'FooCommand'));
    expect(match.executeMethod?.name).toBe('ExecuteFooCommand');
    expect(match.canExecuteTargetName).toBe('CanExecuteFooCommand');
    expect(match.canExecuteMethodRemovable).toBe(false);
  });

  test('declines a fix when neither a lambda nor an execute method exists', () => {
    const source = cs('public class Shell', '{', '    public DelegateCommand GoCommand { get; set; }', '}');
    const ctx = ctxOf(source, 'GoCommand');
    expect(delegateCommandTypeRule.detect(ctx)).toBe(true);
    expect(delegateCommandTypeRule.plan?.(ctx, () => undefined)).toBeUndefined();
  });
});
