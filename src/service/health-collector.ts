// health-collector.ts - Runs the collectors and writes one report file
import * as path from 'path';
import { SystemProbe } from '../monitoring/system-probe';
import { MetricsCollector } from '../monitoring/metrics-collector';
import { ProcessCollector } from '../monitoring/process-collector';
import { NetworkCollector } from '../monitoring/network-collector';
import { assembleReport, ReportParts } from '../report/report-assembler';
import { generateFilename, renderReport } from '../report/report-serializer';
import { atomicWriteFileSync, ensureDirectory } from '../common/fs-utils';
import { LogWriter } from '../common/logger';
import { HealthMonitorConfig } from '../config/config';
import { Report } from '../types';

export type RunOptions = Pick<
  HealthMonitorConfig,
  'outputDir' | 'format' | 'topProcesses' | 'includeAllConnections' | 'cpuSampleIntervalMs'
>;

export class HealthCollector {
  private probe: SystemProbe;
  private logger: LogWriter;
  private clock: () => Date;

  constructor(probe: SystemProbe, logger: LogWriter, clock: () => Date = () => new Date()) {
    this.probe = probe;
    this.logger = logger;
    this.clock = clock;
  }

  async collectAll(options: Omit<RunOptions, 'outputDir' | 'format'>): Promise<ReportParts> {
    const metricsCollector = new MetricsCollector(this.probe, this.logger, options.cpuSampleIntervalMs);
    const processCollector = new ProcessCollector(this.probe, this.logger);
    const networkCollector = new NetworkCollector(this.probe, this.logger);

    this.logger.startOperation('Collecting system metrics');
    const metrics = await metricsCollector.collect();

    this.logger.startOperation('Enumerating processes');
    const processes = await processCollector.collect(options.topProcesses);

    this.logger.startOperation('Analyzing network connections');
    const network = await networkCollector.collect(options.includeAllConnections);

    return { metrics, processes, network };
  }

  async buildReport(options: Omit<RunOptions, 'outputDir' | 'format'>): Promise<Report> {
    const parts = await this.collectAll(options);
    const host = await this.probe.hostIdentity();
    return assembleReport(parts, host, this.clock());
  }

  /**
   * Collect, render and write the report. Returns the path of the written
   * file; directory and write failures propagate to the caller.
   */
  async run(options: RunOptions): Promise<string> {
    const report = await this.buildReport(options);

    this.logger.startOperation('Writing results to report file');
    const content = renderReport(report, options.format);
    ensureDirectory(options.outputDir);
    const filePath = path.join(options.outputDir, generateFilename(options.format, this.clock()));
    atomicWriteFileSync(filePath, content);

    this.logger.endOperation('Health snapshot', true, { file: filePath });
    return filePath;
  }
}
