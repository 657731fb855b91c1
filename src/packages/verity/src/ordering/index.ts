export * from './comparable';
export * from './orderedSpec';
