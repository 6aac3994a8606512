/**
 * Hack Assembly Parser
 *
 * Parses Hack assembly source code into instruction nodes.
 */

export * from './lexer.js';
export * from './parser.js';
export * from './printer.js';
export * from './labels.js';
export { main as runCli } from './cli.js';
