export type * from './book';
export type * from './capabilities';
export type * from './content-block';
export type * from './link-reference';
export type * from './package-output';
export type * from './parsed-document';
export type * from './pipeline-options';
export type * from './run-report';
