import type { RuleDescriptor } from './types';

const CATEGORY = 'Migration';

export const NOTIFIED_SETTER: RuleDescriptor = {
  id: 'notified-setter',
  title: 'Property notifies changes manually',
  description:
    'The setter calls OnPropertyChanged or SetProperty by hand. Declare a partial property marked [ObservableProperty] instead.',
  messageFormat: "Property '{0}' raises change notifications manually; convert it to [ObservableProperty]",
  category: CATEGORY,
  severity: 'error',
  fixable: true,
};

export const SIMPLE_COMMAND_TYPE: RuleDescriptor = {
  id: 'simple-command-type',
  title: 'Property of type Command',
  description:
    'Command properties carry no structure a relay method can be derived from. Replace them with a [RelayCommand] method by hand.',
  messageFormat: "Property '{0}' is typed Command; replace it with a [RelayCommand] method",
  category: CATEGORY,
  severity: 'error',
  fixable: false,
};

export const DELEGATE_COMMAND_TYPE: RuleDescriptor = {
  id: 'delegate-command-type',
  title: 'Property of type DelegateCommand',
  description:
    'DelegateCommand properties wrap an execute lambda or Execute/CanExecute methods. Generate the command from a [RelayCommand] method instead.',
  messageFormat: "Property '{0}' is typed DelegateCommand; convert it to a [RelayCommand] method",
  category: CATEGORY,
  severity: 'error',
  fixable: true,
};
