/**
 * Monitoring Module
 *
 * Host and server-process resource sampling, temperature reading and
 * peak-usage analysis.
 */

export {
  HostCpuMeter,
  hostRamUsedGb,
  osHostProbe,
  type CpuTimes,
  type HostMemory,
  type HostProbe,
} from './host-metrics.js';

export {
  ProcessLocator,
  SystemProcessTable,
  parseProcStatCpuMs,
  parseProcStatPpid,
  parseProcStatusRssBytes,
  parsePsCpuTime,
  type ProcessInfo,
  type ProcessTable,
  type ProcessUsage,
  type PsRunner,
  type SystemProcessTableOptions,
} from './process-table.js';

export {
  DEFAULT_PARSE_RULES,
  DEFAULT_READING_PATTERN,
  TemperatureReader,
  execaRunner,
  parseTemperature,
  type CommandRunner,
  type TemperatureParseRules,
  type TemperatureReaderOptions,
  type TemperatureSource,
} from './temperature-reader.js';

export {
  ResourceSampler,
  type ProcessTracking,
  type ResourceSamplerOptions,
} from './resource-sampler.js';

export { analyzeResourceUsage } from './resource-analyzer.js';
