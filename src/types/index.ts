export type * from './cst';
export type * from './pattern';
export type * from './pass';
export type * from './result';
export type * from './config';
