/**
 * export core modules
 */
export * from './appliance';
export * from './appliance-api';
export * from './bootstrap-core';
export * from './bootstrap-environment';
export * from './bootstrap-error';
export * from './bootstrap-secrets';
export * from './bootstrap-setting';
export * from './context-strategy';
export * from './credential';
export * from './helper-function';
export * from './inventory';
export * from './logging-proxy';
export * from './loadmaster';
