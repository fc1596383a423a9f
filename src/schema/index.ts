// src/schema/index.ts

export * from './config';
