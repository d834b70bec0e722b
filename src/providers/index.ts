export type { ILogProvider, LogEvent, LogLevel, RequestLogEvent } from './ILogProvider.js';
export { ConsoleLogProvider } from './ConsoleLogProvider.js';
export { AxiomLogProvider } from './AxiomLogProvider.js';
export type { IBackendRunner } from './IBackendRunner.js';
export { OpenAIRunner } from './OpenAIRunner.js';
