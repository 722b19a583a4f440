export * from './configuration-context';
export * from './eula-context';
export * from './licensing-context';
