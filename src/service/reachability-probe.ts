// reachability-probe.ts - Remote-access services, listeners and leftover remote-control software
import { ComponentLogger } from '../common/logger';
import { errorMessage } from '../common/errors';
import { ActivityConfig } from '../config/config';
import { outputOf, QueryOutcome } from '../monitoring/command-runner';
import { OsSignalSource } from '../monitoring/os-signal-source';
import { ReachabilitySnapshot, YesNo } from '../types';

const ARTIFACT_HITS_PER_PATTERN = 20;

function yesNo(value: boolean): YesNo {
  return value ? 'Yes' : 'No';
}

function succeeded(outcome: QueryOutcome): boolean {
  return outcome.status === 'ok' && outcome.exitCode === 0;
}

export function isListening(netstatOutput: string, port: number): boolean {
  const listener = new RegExp(`\\.${port}\\s.*LISTEN`);
  return netstatOutput.split('\n').some(line => listener.test(line));
}

export class ReachabilityProbe {
  private source: OsSignalSource;
  private config: ActivityConfig;
  private timeoutMs: number;
  private logger: ComponentLogger;

  constructor(source: OsSignalSource, config: ActivityConfig, timeoutSeconds: number, logger: ComponentLogger) {
    this.source = source;
    this.config = config;
    this.timeoutMs = timeoutSeconds * 1000;
    this.logger = logger;
  }

  async probe(): Promise<ReachabilitySnapshot> {
    const netstat = outputOf(await this.source.exec('netstat', ['-anv', '-p', 'tcp'], this.timeoutMs)) ?? '';

    const sshdRunning = await this.processRunning('sshd');
    const sshPortListening = isListening(netstat, 22);

    // A listener on 5900 means the service is up even when the process name differs
    const vncPortListening = isListening(netstat, 5900);
    const screenSharingRunning = vncPortListening ||
      await this.processRunning('screensharingd') ||
      await this.processRunning('screensha');

    const tailscalePresent = await this.isolated('Tailscale CLI', false, () => this.source.isExecutable(this.config.tailscaleBinary));
    const tailscalePeerReachable = tailscalePresent
      ? await this.isolated<YesNo | 'Unknown'>('Tailscale peers', 'Unknown', () => this.probeTailscalePeers())
      : 'Unknown';
    const remoteAccessArtifacts = await this.isolated<string[]>('remote-access artifacts', [], () => this.scanArtifacts());

    return {
      sshdRunning: yesNo(sshdRunning),
      sshPortListening: yesNo(sshPortListening),
      screenSharingRunning: yesNo(screenSharingRunning),
      vncPortListening: yesNo(vncPortListening),
      tailscaleCliPresent: yesNo(tailscalePresent),
      tailscalePeerReachable,
      remoteAccessArtifacts
    };
  }

  private async processRunning(name: string): Promise<boolean> {
    return succeeded(await this.source.exec('pgrep', ['-x', name], this.timeoutMs));
  }

  private async probeTailscalePeers(): Promise<YesNo> {
    const status = outputOf(await this.source.exec(this.config.tailscaleBinary, ['status'], this.timeoutMs)) ?? '';
    const peer = new RegExp(this.config.tailscalePeerPattern, 'i');
    return yesNo(status.split('\n').some(line => peer.test(line)));
  }

  async scanArtifacts(): Promise<string[]> {
    const hits = new Set<string>();
    for (const dir of this.config.remoteAccessPaths) {
      if (!(await this.source.pathExists(dir))) continue;
      for (const pattern of this.config.remoteAccessPatterns) {
        try {
          for (const hit of await this.source.findEntries(dir, pattern, ARTIFACT_HITS_PER_PATTERN)) {
            hits.add(hit);
          }
        } catch (error) {
          this.logger.warn('Remote-access artifact scan failed', { dir, pattern, error: errorMessage(error) });
        }
      }
    }
    return Array.from(hits).sort();
  }

  private async isolated<T>(label: string, fallback: T, query: () => Promise<T>): Promise<T> {
    try {
      return await query();
    } catch (error) {
      this.logger.warn(`Reachability query failed: ${label}; using default`, { error: errorMessage(error) });
      return fallback;
    }
  }
}
