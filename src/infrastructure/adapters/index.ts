// Adapters barrel export
export * from './persistence/mongodb';
export * from './session';
