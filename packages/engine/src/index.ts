// ---------------------------------------------------------------------------
// @probekit/engine
//
// Concurrent probe engine. Shared by the `user`, `info` and `recon` tools.
// ---------------------------------------------------------------------------

// Probe types
export type {
  ProbeSpec,
  ProbeKind,
  HttpExistenceSpec,
  TcpConnectSpec,
  HeaderFetchSpec,
  PathProbeSpec,
  RawOutcome,
  ProbeOutcome,
  OutcomeKind,
  FailureCause,
  Verdict,
  VerdictStatus,
  ProbeResult,
  ProbeContext,
  ProbeExecutor,
  ExecutorRegistry,
} from "./probes/types.js";

// Executors
export { defaultExecutors } from "./probes/index.js";
export { PATH_BODY_MAX_BYTES, httpGet, httpExistenceExecutor, headerFetchExecutor, pathProbeExecutor } from "./probes/http.js";
export { tcpConnectExecutor, cleanBanner, BANNER_WAIT_MS } from "./probes/tcp.js";
export { describeFailure, errorCode, MalformedTargetError } from "./probes/failure.js";

// Dispatcher
export {
  dispatchProbes,
  assertDispatchable,
  DEFAULT_CONCURRENCY,
  DEFAULT_TIMEOUT_MS,
  type DispatchOptions,
  type DispatchedProbe,
} from "./dispatcher.js";
export { ResultChannel } from "./channel.js";

// Classifier
export { classifyOutcome, findMarker } from "./classifier.js";

// Aggregator
export { ScanReportBuilder, type ScanReport, type VerdictCounts, type Clock } from "./report.js";

// Scan runner / session
export {
  runScan,
  ScanSession,
  type ScanOptions,
  type ScanSessionOptions,
  type GeoLookup,
} from "./scan.js";
export { SingleFlightCache } from "./cache.js";

// Catalogs
export {
  PLATFORMS,
  INFO_PORTS,
  RECON_PORTS,
  HIDDEN_PATHS,
  PATH_PRESENT_STATUSES,
  DEFAULT_USER_AGENT,
  TOOL_DEFAULTS,
  serviceName,
  platformProbes,
  portProbes,
  pathProbes,
  headerProbe,
  type Platform,
  type PortProbeOptions,
  type HeaderProbeOptions,
} from "./catalog.js";

// Targets
export {
  normalizeUsername,
  normalizeHost,
  normalizeBaseUrl,
  validateTargetUrl,
  expandTemplate,
  buildUrl,
  resolvePath,
  hostForUrl,
  type BaseUrl,
  type ValidateResult,
} from "./targets.js";

// Network helpers
export { resolveHost, reverseLookup, withDeadline, DNS_TIMEOUT_MS, type Resolution, type LookupAll } from "./net/dns.js";
export { lookupGeolocation, parseGeoResponse, GEO_TIMEOUT_MS, type GeoInfo } from "./net/geo.js";
export { parseRobots, type RobotsRule } from "./robots.js";

// Config
export { loadConfig, platformsFromConfig, didYouMean, DEFAULT_CONFIG, CONFIG_FILE, type ProbekitConfig } from "./config.js";

// Errors
export { ScanInputError, errorMessage } from "./errors.js";

// Logger
export { logger } from "./logger.js";
