export * from './memory-storage';
export * from './file-storage';
export * from './fetch-transport';
export * from './mock-transport';
export * from './connectivity';
export * from './interval-background-runner';
