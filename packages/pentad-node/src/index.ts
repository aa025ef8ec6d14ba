// Main entry point for the Node.js adapters

// Platform adapters
export * from './platform/index.js';

// Message bus
export * from './messaging/index.js';

// Re-export core interfaces for convenience
export type { IFileSystem, IProcessExecutor, IMessageBus, ILogger } from '@pentad/core';
