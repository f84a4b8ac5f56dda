export * from './schema';
export * from './gate';
export * from './validator';
export * from './compiler';
