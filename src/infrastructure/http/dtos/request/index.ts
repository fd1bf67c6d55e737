export * from './user-requests.dto';
export * from './conversation-requests.dto';
export * from './vocabulary-requests.dto';
