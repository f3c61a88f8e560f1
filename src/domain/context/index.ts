export { DispatchScope, getCurrentDispatch } from './DispatchScope';
export type { DispatchScopeData } from './DispatchScope';
