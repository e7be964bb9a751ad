export * from './src/genericController';
export * from './src/resourceController';
export * from './src/createMovieController';

export * from './src/config';
export * from './src/dynamoDB';
export * from './src/json';
export * from './src/metrics';

export * from './src/lambdaLogger';
export * from './src/logger';
export * from './src/logReader';
