/**
 * @cudarch/catalog
 *
 * Catalogs the GPU compute capabilities compiled into the shared
 * libraries of published framework packages.
 */

// Types
export * from './types.js';

// Errors
export {
  CatalogError,
  ErrorCodes,
  ErrorMessages,
  ErrorRemediation,
  isCatalogError,
  wrapError,
  errorMessage,
  type ErrorCode,
} from './errors.js';

// Configuration
export { loadConfig, mergeConfig, resolveTargetPath, DEFAULT_CONFIG, CONFIG_FILE_NAMES, INSPECTOR_ENV } from './config.js';

// Package index
export { PackageIndexClient, parsePackageInfo, type DownloadProgress } from './pypi.js';
export { compareVersions, filterReleases, isStableRelease } from './versions.js';
export {
  comparePythonVersions,
  formatFileSize,
  parseWheelFilename,
  pythonVersionFromFilename,
  selectWheels,
  UNKNOWN_PYTHON,
  type WheelFilename,
} from './wheels.js';

// Archives and inspection
export { extractSharedLibraries, findLibraries, isSharedLibrary, FALLBACK_LIBRARY_PATTERNS } from './archive.js';
export { ExecError, execTool, runInspector, splitCommand, type ExecFn, type ExecOptions, type ExecResult, type InspectorOptions } from './inspector.js';
export {
  compareArchitectures,
  mergeReports,
  parseInspectorOutput,
  sortArchitectures,
  toComputeCapability,
} from './architectures.js';
export {
  analyzeWheel,
  inspectLibraries,
  inspectLocalPath,
  type AnalysisContext,
  type LocalPackageOptions,
} from './analyzer.js';

// Results and tables
export {
  RESULTS_SCHEMA_VERSION,
  createEmptyResults,
  hasAnalyzedResult,
  hasResult,
  listResults,
  loadResults,
  resultKey,
  saveResults,
  upsertResult,
  type ResultsFile,
} from './results.js';
export {
  ARCH_NOTATIONS,
  TABLE_HEADER,
  compareResults,
  formatArchitectures,
  generateTable,
  isArchNotation,
  summarizeByVersion,
  type ArchNotation,
  type TableOptions,
  type VersionSummary,
} from './table.js';
