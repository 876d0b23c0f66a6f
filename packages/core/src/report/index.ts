export * from './rows.js';
export * from './csv.js';
export * from './json.js';
