export * from './formatValue';
export * from './location';
