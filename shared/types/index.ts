export type * from './model';
export type * from './engine';
export type * from './job';
export type * from './settings';
export type * from './errors';
