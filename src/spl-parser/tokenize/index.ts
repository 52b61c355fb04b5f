export * from './position';
export * from './scan';
export * from './token';
