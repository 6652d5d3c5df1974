export * from './response-helpers';
export * from './SSEManager';
