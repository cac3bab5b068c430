// CLI types
export * from './cli.types';

// Commit and lint result types
export * from './commit.types';

// Configuration types
export * from './config.types';

// Context and runtime types
export * from './context.types';

// Environment input metadata types
export * from './metadata.types';
