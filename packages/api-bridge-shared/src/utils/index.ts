export { assertUnreachable } from './assert-unreachable';
export { isDefined } from './is-defined';
export { isPlainObject } from './is-plain-object';
