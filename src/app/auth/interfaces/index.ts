export * from './IAuth';
