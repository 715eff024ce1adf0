export * from './logger';
export * from './tracer';
