export * from './tavily-search.js';
export * from './adk-tools.js';
