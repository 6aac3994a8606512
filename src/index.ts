// Hack assembly parser
// Turns Hack assembly source into typed instruction nodes

export * from './assembler/index.js';
