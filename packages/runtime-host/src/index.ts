/**
 * @keyline/runtime-host
 *
 * Side-effectful layer around @keyline/config-lang: home directory
 * resolution, configuration file loading and diagnostic log persistence.
 * Uses Node.js built-ins only.
 *
 * @keyline/config-lang defines the contracts; this package implements them.
 */

// KEYLINE_HOME resolution
export type { ResolveKeylineHomeOptions } from './home.js';
export { STARTUP_FILE, defaultKeylineHome, resolveKeylineHome, startupConfigPath } from './home.js';

// Configuration loading
export type { LoadConfigFileOptions, LoadConfigOptions, LoadResult } from './loader.js';
export { loadConfig, loadConfigFile } from './loader.js';

// Logging
export type { LogIO } from './logging/log-io.js';
export { FileLogIO, MemoryLogIO } from './logging/log-io.js';
export { DIAGNOSTICS_LOG, FileDiagnosticSink } from './logging/file-diagnostic-sink.js';
export type { DiagnosticEvent, DiagnosticReadResult, DiagnosticReadStats } from './logging/diagnostic-reader.js';
export { readDiagnostics } from './logging/diagnostic-reader.js';
export type { UlidSources } from './logging/ulid.js';
export { createUlidGenerator, ulid } from './logging/ulid.js';
