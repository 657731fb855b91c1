export * from './config';
export * from './errors';
export * from './formatting';
export * from './ordering';
export * from './spec';
export * from './validation';
