export { LexemeMapper } from './lexeme.mapper';
export { ReadModelMapper } from './read-model.mapper';
