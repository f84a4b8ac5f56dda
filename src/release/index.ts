export * from './version';
export * from './git';
export * from './tag-sync';
export * from './composer';
