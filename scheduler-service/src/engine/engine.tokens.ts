export const RANDOM_FACTORY = Symbol('RANDOM_FACTORY');
export const BACKOFF_SETTINGS = Symbol('BACKOFF_SETTINGS');
export const DISPATCHER_OPTIONS = Symbol('DISPATCHER_OPTIONS');
export const EXECUTOR_OPTIONS = Symbol('EXECUTOR_OPTIONS');
