// Legacy shapes
export const ANNOUNCE_CHANGE = 'OnPropertyChanged';
export const COMPARE_AND_ASSIGN = 'SetProperty';
export const NAMEOF = 'nameof';
export const COMMAND_TYPE = 'Command';
export const DELEGATE_COMMAND_TYPE = 'DelegateCommand';

export const COMMAND_SUFFIX = 'Command';
export const ASYNC_SUFFIX = 'Async';
export const EXECUTE_PREFIX = 'Execute';
export const CAN_EXECUTE_PREFIX = 'CanExecute';

// CommunityToolkit.Mvvm source-generator attributes
export const OBSERVABLE_PROPERTY = 'ObservableProperty';
export const NOTIFY_PROPERTY_CHANGED_FOR = 'NotifyPropertyChangedFor';
export const RELAY_COMMAND = 'RelayCommand';

export const COMPONENT_MODEL_NAMESPACE = 'CommunityToolkit.Mvvm.ComponentModel';
export const INPUT_NAMESPACE = 'CommunityToolkit.Mvvm.Input';

export const ASYNC_RETURN_TYPE = 'Task';
export const ACCESSIBILITY_MODIFIERS: ReadonlySet<string> = new Set(['public', 'protected', 'internal', 'private']);
