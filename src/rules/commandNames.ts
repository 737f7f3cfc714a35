import { ASYNC_SUFFIX, COMMAND_SUFFIX } from './reservedNames';

/** Property name without a trailing, case-sensitive `Command`. */
export function commandStem(propertyName: string): string {
  if (propertyName.length > COMMAND_SUFFIX.length && propertyName.endsWith(COMMAND_SUFFIX)) {
    return propertyName.slice(0, -COMMAND_SUFFIX.length);
  }
  return propertyName;
}

export function relayMethodName(stem: string, isAsync: boolean): string {
  return isAsync && !stem.endsWith(ASYNC_SUFFIX) ? stem + ASYNC_SUFFIX : stem;
}
