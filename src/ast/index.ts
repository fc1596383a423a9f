// src/ast/index.ts

export * from './tokens';
export * from './lexer';
export * from './token-stream';
export * from './nodes';
export * from './parser';
export * from './render';
