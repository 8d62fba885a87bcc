export * from './errors';
export * from './logging';
export * from './template';
export * from './model';
export * from './sub';
export * from './yaml-loader';
export * from './references';
export * from './parser';
export * from './parameters';
export * from './ir';
export * from './materialize';
export * from './intrinsic-resolver';
export * from './conditions';
export * from './graph';
export * from './desired';
export * from './state';
export * from './diff';
export * from './outputs';
export * from './masking';
