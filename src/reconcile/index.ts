// src/reconcile/index.ts

export * from './dialect';
export * from './classifier';
export * from './accumulator';
export * from './fixups';
export * from './zipper';
export * from './merge';
