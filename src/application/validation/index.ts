export * from './intent-parameters.schema';
