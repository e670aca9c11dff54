// activity-collector.ts - Console users, GUI applications, virtual machines and resource hogs
import * as path from 'path';
import { ComponentLogger } from '../common/logger';
import { errorMessage } from '../common/errors';
import { ActivityConfig } from '../config/config';
import { outputOf } from '../monitoring/command-runner';
import { OsSignalSource } from '../monitoring/os-signal-source';
import { ActivitySnapshot, ConsoleUser, VmDetail, VmState } from '../types';

// ============================================
// INTERFACES
// ============================================

export interface ProcessEntry {
  user: string;
  pid: number;
  cpuPercent: number;
  rssKb: number;
  command: string;
}

export interface AppEntry {
  user: string;
  name: string;
  version?: string;
  legacy: boolean;
}

export const LEGACY_MARKER = '⚠️ LEGACY';
const APP_EXECUTABLE = /\.app\/Contents\/MacOS\//;

// Oldest supported major version per product
const LEGACY_MAJOR_VERSIONS: Record<string, number> = {
  'VMware Fusion': 13,
  'VirtualBox': 7,
  'Parallels Desktop': 17
};

// ============================================
// PURE HELPERS
// ============================================

/** HID idle time in the compact form the dashboard shows. */
export function formatIdle(seconds: number): string {
  if (seconds < 5) return 'active';
  if (seconds < 60) return `${seconds}s`;
  if (seconds < 3600) return `${Math.floor(seconds / 60)}m`;
  if (seconds < 86400) {
    const hours = Math.floor(seconds / 3600);
    const minutes = Math.floor((seconds % 3600) / 60);
    return `${hours}:${String(minutes).padStart(2, '0')}`;
  }
  return `${Math.floor(seconds / 86400)}days`;
}

export function isLegacyVersion(appName: string, version: string | undefined): boolean {
  if (!version) return false;
  const major = parseInt(version.split('.')[0], 10);

  if (appName.startsWith('Adobe Photoshop')) {
    return version.includes('CS') || (!isNaN(major) && major < 21);
  }
  const minimum = LEGACY_MAJOR_VERSIONS[appName];
  if (minimum === undefined || isNaN(major)) return false;
  return major < minimum;
}

/** Parses `ps -axo user=,pid=,%cpu=,rss=,comm=` output; the command may contain spaces. */
export function parseProcessTable(output: string): ProcessEntry[] {
  const entries: ProcessEntry[] = [];
  for (const line of output.split('\n')) {
    const match = line.trim().match(/^(\S+)\s+(\d+)\s+([\d.]+)\s+(\d+)\s+(.+)$/);
    if (!match) continue;
    entries.push({
      user: match[1],
      pid: parseInt(match[2], 10),
      cpuPercent: parseFloat(match[3]),
      rssKb: parseInt(match[4], 10),
      command: match[5]
    });
  }
  return entries;
}

export function describeGuestOs(raw: string): string {
  const value = raw.toLowerCase();
  if (value.includes('windows7') || value.includes('win7')) return 'Windows 7';
  if (value.includes('windows9') || value.includes('windows10') || value.includes('win10')) return 'Windows 10';
  if (value.includes('darwin') || value.includes('macos')) {
    if (value.includes('10.3')) return 'Mac OS X 10.3 Panther';
    const version = value.match(/10\.\d+/);
    return version ? `Mac OS X ${version[0]}` : 'macOS';
  }
  return raw;
}

/** The .vmx argument of a vmware-vmx command line; bundle paths may contain spaces. */
export function vmxPathFrom(command: string): string | undefined {
  const bundle = command.indexOf('.vmwarevm/');
  if (bundle < 0) return undefined;
  const end = command.indexOf('.vmx', bundle + '.vmwarevm/'.length);
  if (end < 0) return undefined;
  const start = Math.max(command.lastIndexOf(' /', bundle) + 1, command.lastIndexOf('"', bundle) + 1);
  return command.slice(start, end + '.vmx'.length);
}

export function guestRiskFor(guestOs: string): string | undefined {
  if (guestOs.includes('Windows 7')) return 'EOL OS - legacy DirectX translation';
  if (guestOs.includes('10.3')) return 'Guest OS from 2003 - extreme legacy emulation';
  if (/10\.[456]\b/.test(guestOs)) return 'PowerPC/legacy emulation';
  return undefined;
}

export function vmStateFor(running: boolean, totalCpuPercent: number): VmState {
  if (!running) return 'Not Running';
  if (totalCpuPercent <= 0) return 'Idle';
  if (totalCpuPercent < 1) return 'Light Activity';
  if (totalCpuPercent < 10) return 'Moderate Activity';
  return 'Active';
}

export function renderVmActivity(vms: VmDetail[]): string {
  if (vms.length === 0) return 'No VMs running';
  return vms.map((vm, index) => {
    const lines = [
      `VM ${index + 1} [${vm.user}]: ${vm.guestOs}`,
      `  PID ${vm.pid}, CPU ${vm.cpuPercent}%, RAM ${vm.memoryGb.toFixed(2)}GB, Runtime ${vm.runtime}`
    ];
    if (vm.guestRisk) lines.push(`  ⚠️ ${vm.guestRisk}`);
    return lines.join('\n');
  }).join('\n');
}

export function renderInventory(users: string[], apps: AppEntry[], scanEmpty: boolean): string {
  if (users.length === 0) return 'No users logged in';
  return users.map(user => {
    if (scanEmpty) return `[${user}] Unable to detect GUI apps (ps scan empty)`;
    const own = apps.filter(app => app.user === user);
    if (own.length === 0) return `[${user}] No GUI apps detected`;
    const items = own.map(app => {
      let item = app.version ? `${app.name} ${app.version}` : app.name;
      if (app.legacy) item += ` ${LEGACY_MARKER}`;
      return item;
    });
    return `[${user}] ${items.join(', ')}`;
  }).join('\n');
}

export function highRiskLabel(vmwareRunning: boolean, apps: AppEntry[]): string {
  const legacy = apps.filter(app => app.legacy);
  if (vmwareRunning && legacy.some(app => app.name === 'VMware Fusion')) return 'VMware Legacy';
  if (legacy.length > 1) return 'Multiple Legacy';
  if (legacy.length === 1) return `${legacy[0].name} Legacy`;
  return 'None';
}

export function legacySoftwareFlags(apps: AppEntry[], vms: VmDetail[]): string {
  const fusion = apps.find(app => app.name === 'VMware Fusion' && app.legacy);
  if (!fusion) return 'No legacy software detected';

  let flags = `VMware Fusion ${fusion.version ?? ''}: Pre-13.x uses deprecated kernel extensions, ` +
    'known GPU conflicts with Sonoma, incompatible with Metal rendering pipeline.';
  const legacyGuests = vms.filter(vm => vm.guestRisk !== undefined).length;
  if (legacyGuests > 0) {
    flags += ` Running ${legacyGuests} VM(s) with legacy guest OSes.`;
  }
  return `${flags} UPGRADE RECOMMENDED to VMware Fusion 13.5+`;
}

// ============================================
// ACTIVITY COLLECTOR
// ============================================

export class ActivityCollector {
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

  async collect(): Promise<ActivitySnapshot> {
    const userNames = await this.isolated<string[]>('console users', [], () => this.readConsoleUsers());
    const idle = userNames.length > 0
      ? await this.isolated<string>('idle time', 'unknown', () => this.readIdle())
      : 'unknown';
    const users: ConsoleUser[] = userNames.map(name => ({ name, idle }));

    const processes = await this.isolated<ProcessEntry[]>('process table', [], () => this.readProcesses());
    const apps = await this.isolated<AppEntry[]>('application inventory', [], () => this.readApplications(userNames, processes));
    const vms = await this.isolated<VmDetail[]>('VM details', [], () => this.readVms());

    const vmwareRunning = vms.length > 0;
    const vmwareCpuPercent = Math.round(vms.reduce((sum, vm) => sum + vm.cpuPercent, 0) * 10) / 10;
    const vmwareMemoryGb = Math.round(vms.reduce((sum, vm) => sum + vm.memoryGb, 0) * 100) / 100;

    return {
      users,
      activeUsersText: users.length > 0
        ? users.map(user => `${user.name} (console, idle ${user.idle})`).join('\n')
        : 'No console users',
      totalGuiApps: apps.length,
      applicationInventory: renderInventory(userNames, apps, processes.length === 0),
      vmwareStatus: vmwareRunning ? 'Running' : 'Not Running',
      vmState: vmStateFor(vmwareRunning, vmwareCpuPercent),
      vms,
      vmActivity: renderVmActivity(vms),
      vmwareCpuPercent,
      vmwareMemoryGb,
      highRiskApps: highRiskLabel(vmwareRunning, apps),
      resourceHogs: this.resourceHogs(processes),
      legacySoftwareFlags: legacySoftwareFlags(apps, vms)
    };
  }

  async readConsoleUsers(): Promise<string[]> {
    const text = outputOf(await this.source.exec('who', [], this.timeoutMs)) ?? '';
    const names = text
      .split('\n')
      .filter(line => line.includes('console'))
      .map(line => line.trim().split(/\s+/)[0])
      .filter(name => name.length > 0);
    return Array.from(new Set(names)).sort();
  }

  async readIdle(): Promise<string> {
    const text = outputOf(await this.source.exec('ioreg', ['-c', 'IOHIDSystem'], this.timeoutMs));
    const line = text?.split('\n').find(l => l.includes('HIDIdleTime'));
    const raw = line?.trim().split(/\s+/).pop();
    const nanoseconds = raw === undefined ? NaN : Number(raw);
    if (!Number.isFinite(nanoseconds)) return 'unknown';
    return formatIdle(Math.round(nanoseconds / 1e9));
  }

  async readProcesses(): Promise<ProcessEntry[]> {
    const text = outputOf(await this.source.exec('ps', ['-axo', 'user=,pid=,%cpu=,rss=,comm='], this.timeoutMs));
    return text ? parseProcessTable(text) : [];
  }

  async readApplications(users: string[], processes: ProcessEntry[]): Promise<AppEntry[]> {
    const apps: AppEntry[] = [];
    for (const user of users) {
      const commands = Array.from(new Set(
        processes.filter(p => p.user === user && APP_EXECUTABLE.test(p.command)).map(p => p.command)
      )).sort();

      const seen = new Set<string>();
      for (const command of commands) {
        const bundle = command.slice(0, command.indexOf('/Contents/MacOS/'));
        const name = path.basename(bundle, '.app');
        if (seen.has(name)) continue;
        seen.add(name);

        const version = await this.readBundleVersion(bundle);
        apps.push({ user, name, version, legacy: isLegacyVersion(name, version) });
      }
    }
    return apps;
  }

  async readBundleVersion(bundle: string): Promise<string | undefined> {
    const plist = path.join(bundle, 'Contents', 'Info.plist');
    for (const key of ['CFBundleShortVersionString', 'CFBundleVersion']) {
      const text = outputOf(await this.source.exec('defaults', ['read', plist, key], this.timeoutMs));
      const version = text?.trim();
      if (version) return version;
    }
    return undefined;
  }

  async readVms(): Promise<VmDetail[]> {
    const pidText = outputOf(await this.source.exec('pgrep', ['-x', 'vmware-vmx'], this.timeoutMs)) ?? '';
    const pids = pidText.split('\n').map(l => parseInt(l.trim(), 10)).filter(pid => !isNaN(pid));

    const vms: VmDetail[] = [];
    for (const pid of pids) {
      const line = outputOf(await this.source.exec(
        'ps', ['-p', String(pid), '-o', 'user=,pid=,%cpu=,rss=,etime=,command='], this.timeoutMs
      ))?.trim();
      const match = line?.match(/^(\S+)\s+\d+\s+([\d.]+)\s+(\d+)\s+(\S+)\s+(.*)$/);
      if (!match) continue;

      const guestOs = await this.readGuestOs(match[5]);
      vms.push({
        pid,
        user: match[1],
        guestOs,
        cpuPercent: parseFloat(match[2]),
        memoryGb: Math.round((parseInt(match[3], 10) / 1024 / 1024) * 100) / 100,
        runtime: match[4],
        guestRisk: guestRiskFor(guestOs)
      });
    }
    return vms;
  }

  private async readGuestOs(command: string): Promise<string> {
    const vmx = vmxPathFrom(command);
    if (!vmx) return 'Unknown';
    const content = await this.source.readText(vmx);
    const guest = content?.match(/^\s*guestOS\s*=\s*"([^"]*)"/m);
    return guest ? describeGuestOs(guest[1]) : 'Unknown';
  }

  resourceHogs(processes: ProcessEntry[]): string {
    const lines = processes
      .filter(p => p.cpuPercent > this.config.hogCpuPercent || p.rssKb / 1024 / 1024 > this.config.hogMemoryGb)
      .map(p => `${path.basename(p.command)} (${p.pid}): CPU ${p.cpuPercent.toFixed(1)}%, ` +
        `RAM ${(p.rssKb / 1024 / 1024).toFixed(2)}GB, User: ${p.user}`);
    if (lines.length === 0) return 'No resource hogs detected';
    return Array.from(new Set(lines)).sort().join('\n');
  }

  private async isolated<T>(label: string, fallback: T, query: () => Promise<T>): Promise<T> {
    try {
      return await query();
    } catch (error) {
      this.logger.warn(`Activity query failed: ${label}; using default`, { error: errorMessage(error) });
      return fallback;
    }
  }
}
