/**
 * Core types for the compute-capability catalog
 */

// ============================================================================
// Configuration
// ============================================================================

export interface CatalogConfig {
  version: string;
  /** Package name on the index (e.g. 'torch') */
  package: string;
  /** Only releases starting with this prefix are catalogued */
  versionPrefix: string;
  /** Wheels must carry this platform tag in their filename */
  platformTag: string;
  /** Glob patterns (relative to the unpacked package) of libraries to inspect */
  libraries: string[];
  index: IndexConfig;
  inspector: InspectorConfig;
  output: OutputConfig;
  /** Fallback per-wheel size used for download estimates */
  estimatedWheelBytes: number;
}

export interface IndexConfig {
  /** Base URL of a PyPI-compatible JSON API */
  url: string;
  /** Request timeout in milliseconds */
  timeout: number;
}

export interface InspectorConfig {
  /**
   * Command line of the binary inspection tool. May include a wrapper,
   * e.g. `singularity exec --bind /data /images/cuda.sif cuobjdump`.
   */
  command: string;
  /** Maximum captured stdout size in bytes */
  maxBuffer: number;
}

export interface OutputConfig {
  results: string;
  pipTable: string;
  localTable: string;
}

// ============================================================================
// Package index
// ============================================================================

export interface WheelInfo {
  filename: string;
  url: string;
  size: number;
  pythonVersion: string;
  platformTag: string;
}

/** One file entry of a release on the PyPI JSON API */
export interface IndexFile {
  filename: string;
  url: string;
  size: number;
  packagetype: string;
}

export interface IndexPackageInfo {
  info: { name: string; version: string };
  releases?: Record<string, IndexFile[]>;
  urls: IndexFile[];
}

// ============================================================================
// Analysis
// ============================================================================

export type Channel = 'pip' | 'local';

export const CHANNELS: readonly Channel[] = ['pip', 'local'];

export function isChannel(value: string): value is Channel {
  return (CHANNELS as readonly string[]).includes(value);
}

export interface ArchitectureReport {
  /** Architectures of embedded cubin (SASS) images */
  elf: string[];
  /** Architectures of embedded PTX images */
  ptx: string[];
  /** Union of both */
  all: string[];
  /** Raw lines the architectures were read from */
  matchedLines: string[];
}

export type ResultStatus = 'analyzed' | 'failed';

export interface PackageResult {
  channel: Channel;
  /** Display name: the wheel filename, or a label for local packages */
  filename: string;
  packageVersion: string;
  pythonVersion: string;
  status: ResultStatus;
  architectures: string[];
  elf: string[];
  ptx: string[];
  /** Libraries inspected, relative to the package root */
  libraries: string[];
  warnings: string[];
  error?: string;
  analyzedAt: string;
}

export type AnalysisEvent =
  | { type: 'download-start'; filename: string; url: string }
  | { type: 'download-progress'; filename: string; downloaded: number; total: number }
  | { type: 'download-done'; filename: string; path: string; bytes: number }
  | { type: 'extracted'; filename: string; libraries: number }
  | { type: 'library-missing'; filename: string; patterns: string[] }
  | { type: 'inspecting'; library: string; command: string }
  | { type: 'analyzed'; result: PackageResult };

export type AnalysisListener = (event: AnalysisEvent) => void;
