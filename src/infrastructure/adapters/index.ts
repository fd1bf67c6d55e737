// Adapters barrel export
export * from './persistence';
export * from './ai/claude';
export * from './clock';
