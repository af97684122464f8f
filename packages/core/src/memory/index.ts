export * from './dsr-model';
export * from './parameters';
