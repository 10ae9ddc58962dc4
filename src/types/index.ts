export type * from './issue.type';
export type * from './document.type';
export type * from './validate.type';
export type * from './lint.type';
