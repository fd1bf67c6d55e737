export * from './either';
export { retryOnConflict } from './retry-on-conflict';
export { TutoringOptions } from './tutoring-options';
