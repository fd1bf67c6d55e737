export { ICommandPort } from './command.port';
export { IQueryPort } from './query.port';
