/**
 * Sinks Module
 */

export * from './sink';
export * from './jsonl-sink';
export * from './json-sink';
export * from './console-sink';
export * from './loader';
