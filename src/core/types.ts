/**
 * core/types.ts
 *
 * Single source of truth for every shared type in the project.
 * All modules import from here. Nothing defines its own DTOs.
 */

// ---------------------------------------------------------------------------
// Utility: Correlation ID generation
// ---------------------------------------------------------------------------

export function generateCorrelationId(): string {
  return `req_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;
}

// ---------------------------------------------------------------------------
// Function schema (what we expose to clients in tools/list)
// ---------------------------------------------------------------------------

export interface FunctionParameter {
  type: string;
  properties?: Record<string, FunctionParameter>;
  required?: string[];
  items?: FunctionParameter;
  description?: string;
  enum?: string[];
  default?: unknown;
  minimum?: number;
  maximum?: number;
}

export interface FunctionSchema {
  name: string;
  description: string;
  parameters: {
    type: 'object';
    properties: Record<string, FunctionParameter>;
    required?: string[];
    additionalProperties?: boolean;
  };
}

// ---------------------------------------------------------------------------
// Session & Transport
// ---------------------------------------------------------------------------

export type TransportMode = 'stdio' | 'http';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface SessionConfig {
  transportMode: TransportMode;
  port?: number;                           // HTTP only
  elevationPreApproved?: boolean;          // skip the admin check for whitelisted tools
  elevationWhitelist?: string[];           // tool names pre-approved for elevation
  logLevel?: LogLevel;
  auditLogPath?: string;                   // file path for the log_action audit trail
  cleanupFolders?: string[];               // replaces the platform temp folder list
  gpuCacheTtlMs?: number;                  // how long a GPU reading is reused (default: 10000)
}

// ---------------------------------------------------------------------------
// Invocation, the single normalised shape every transport emits
// ---------------------------------------------------------------------------

export interface ToolInvocation {
  tool: string;                            // resolved tool name (e.g. "system.cpu")
  args: Record<string, unknown>;
  meta: CallMeta;
}

export interface CallMeta {
  source: 'stdio' | 'http' | 'internal';   // which entry point produced the call
  timestamp: number;                       // Date.now() when the call was received
  correlationId?: string;
}

// ---------------------------------------------------------------------------
// Tool Module contract, every tool implements this
// ---------------------------------------------------------------------------

export interface ToolModule {
  /** Unique registry key, must match the names used in TSDs. */
  name: string;

  /**
   * All function schemas this module exposes.
   * Most modules expose several (system_info exposes system.cpu,
   * system.memory, …). Each may get its own TSD.
   */
  tools: FunctionSchema[];

  /**
   * The single dispatcher. The registry calls this with the resolved schema
   * name so the module can fan out internally.
   */
  execute(toolName: string, args: Record<string, unknown>): Promise<ToolResult>;
}

// ---------------------------------------------------------------------------
// Result envelope, what execute() returns
// ---------------------------------------------------------------------------

export interface ToolResult {
  success: boolean;
  data?: unknown;                          // the useful payload on success
  error?: ToolError;                       // structured error on failure
  durationMs: number;                      // wall-clock time of the call
}

export interface ToolError {
  code: string;                            // maps to our error taxonomy (see errors.ts)
  message: string;
  details?: Record<string, unknown>;
}

// ---------------------------------------------------------------------------
// Task-Specific Definition (TSD)
// ---------------------------------------------------------------------------

export type BackoffStrategy = 'none' | 'linear' | 'exponential';

export interface RetryPolicy {
  maxRetries: number;
  backoff: BackoffStrategy;
  baseDelayMs: number;                     // first delay; multiplied on each retry for exponential
  retryableErrors: string[];               // error codes worth retrying
}

export interface RateLimitPolicy {
  maxCallsPerSecond: number;
  burstAllowance: number;                  // extra calls allowed in a burst above the steady rate
}

export interface TaskSpecificDefinition {
  toolName: string;

  retryPolicy?: RetryPolicy;
  timeoutMs?: number;                      // hard wall-clock cap on a single execution attempt

  /** Tighter JSON Schema applied on top of the base tool schema. */
  inputValidation?: Record<string, unknown>;

  /** Named hook that runs BEFORE execute(). Can mutate args. */
  preHook?: string;

  /** Named hook that runs AFTER execute(). Can mutate result. */
  postHook?: string;

  /** If this tool fails after all retries, try this tool name instead. */
  fallbackTool?: string;

  /** Whether this tool needs administrator privileges. */
  requiresElevation?: boolean;

  rateLimits?: RateLimitPolicy;
}

// ---------------------------------------------------------------------------
// Hook contract
// ---------------------------------------------------------------------------

export interface PreHookContext {
  toolName: string;
  args: Record<string, unknown>;
  sessionConfig: SessionConfig;
}

export interface PostHookContext {
  toolName: string;
  args: Record<string, unknown>;
  result: ToolResult;
  sessionConfig: SessionConfig;
}

export type PreHookFn  = (ctx: PreHookContext)  => Promise<Record<string, unknown>>; // returns (possibly mutated) args
export type PostHookFn = (ctx: PostHookContext) => Promise<ToolResult>;              // returns (possibly mutated) result

export interface HookModule {
  pre?:  PreHookFn;
  post?: PostHookFn;
}

// ===========================================================================
// System information DTOs
// ===========================================================================

export interface UptimeInfo {
  seconds: number;
  display: string;
}

export interface CpuInfo {
  name: string;
  cores: string;                           // "8 cores, 16 threads"
  frequency: string;                       // "3.80 GHz (Max: 5.40 GHz)"
  cacheDisplay: string;                    // "L1 - 512 KB | L2 - 8.0 MB | L3 - 32.0 MB"
  sockets: string;
  usagePct: number;
  currentSpeed: string;
}

export interface RamModuleRecord {
  Manufacturer?: string | null;
  PartNumber?: string | null;
  Speed?: number | null;
  MemoryType?: number | null;
  SMBIOSMemoryType?: number | null;
  Capacity?: number | string | null;
  DeviceLocator?: string | null;
}

export interface RamDetails {
  ramName: string;
  ramSpeed: string;
  ramType: string;
  ramSlots: string;
  installedBytes: number;
}

export interface MemoryInfo extends RamDetails {
  totalGb: number;
  usedGb: number;
  availableGb: number;
  percent: number;
}

export type DiskType = 'NVMe SSD' | 'SSD' | 'HDD';

export interface DiskInfo {
  drive: string;                           // "C:"
  totalGb: number;
  usedGb: number;
  freeGb: number;
  usagePct: number;
  storageName: string;
  storageType: DiskType | 'Unknown';
}

export interface PhysicalDrive {
  label: string;                           // "Storage 1"
  name: string;
  totalGb: number;
  type: DiskType;
}

export interface StorageOverview {
  drives: PhysicalDrive[];
  totalStorageGb: number;
}

export interface GpuDevice {
  name: string;
  usagePct: number | null;
  memoryUsedGb: number | null;
  memoryTotalGb: number | null;
  temperatureC: number | null;
  source: 'nvidia-smi' | 'wmi';
}

export interface GpuInfo {
  available: boolean;
  name: string;                            // primary adapter, or "No GPU detected"
  devices: GpuDevice[];
}

export interface MonitorDetail {
  manufacturer: string;
  model: string;
  name: string;
  resolution: string;
  primary: boolean;
  refreshRateHz: number | null;
}

export interface MonitorInfo {
  monitors: string[];
  details: MonitorDetail[];
  count: number;
}

export type ChipsetSource = 'board' | 'cpu-estimate' | 'unknown';

export interface ChipsetDetection {
  chipset: string;
  source: ChipsetSource;
}

export interface MotherboardInfo {
  product: string;
  manufacturer: string;
  version: string;
  chipset: string;
  chipsetSource: ChipsetSource;
  biosVersion: string;
  biosManufacturer: string;
  biosDate: string;
  systemModel: string;
  memorySlots: string;
  maxMemoryCapacity: string;
  memorySlotsUsed: string;
}

export interface OsInfo {
  deviceName: string;
  userName: string;
  edition: string;
  version: string;
  build: string;
  installDate: string;
  experience: string;
  arch: string;
}

/** Every section the report needs. A section that failed to load is null. */
export interface SystemSnapshot {
  uptime: UptimeInfo | null;
  cpu: CpuInfo | null;
  memory: MemoryInfo | null;
  disk: DiskInfo | null;
  storage: StorageOverview | null;
  gpu: GpuInfo | null;
  monitors: MonitorInfo | null;
  motherboard: MotherboardInfo | null;
  os: OsInfo | null;
}

// ===========================================================================
// Cleanup DTOs
// ===========================================================================

export type FolderCleanStatus = 'cleaned' | 'already_clean' | 'missing' | 'access_denied' | 'error';

export interface CleanupFailure {
  item: string;
  message: string;
}

export interface FolderCleanReport {
  path: string;
  status: FolderCleanStatus;
  items: number;
  bytes: number;
  failures: CleanupFailure[];
  message?: string;
}

export interface FolderAnalysis {
  path: string;
  exists: boolean;
  entries: number;
  bytes: number;
  reclaimable: string;
}

export interface MemoryOptimizationSteps {
  selfWorkingSetTrimmed: boolean;
  standbyListPurged: 'full' | 'low-priority' | false;
  modifiedListFlushed: boolean;
  processesTrimmed: number;
  fileCacheTrimmed: boolean;
}

export interface ReleaseSection {
  title: string;
  items: string[];
}

export interface ReleaseNotes {
  version: string;
  date?: string;
  sections: ReleaseSection[];
}

export interface ReleaseData {
  currentVersion: string;
  releases: ReleaseNotes[];             // newest first
}
