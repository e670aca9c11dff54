import { describeOutcome, outputOf, runCommand } from '../src/monitoring/command-runner';

jest.mock('child_process', () => ({
  execFile: jest.fn()
}));

const { execFile } = jest.requireMock<{ execFile: jest.Mock }>('child_process');

type Callback = (error: Error | null, stdout: string, stderr: string) => void;

function respond(error: Error | null, stdout = '', stderr = ''): void {
  execFile.mockImplementation((_file: string, _args: string[], _options: object, callback: Callback) => {
    callback(error, stdout, stderr);
  });
}

beforeEach(() => {
  execFile.mockReset();
});

describe('runCommand', () => {
  it('returns the output of a clean exit', async () => {
    respond(null, 'Verified\n');
    expect(await runCommand('diskutil', ['info', 'disk0'], { timeoutMs: 5000 })).toEqual({
      status: 'ok',
      stdout: 'Verified\n',
      stderr: '',
      exitCode: 0
    });
    expect(execFile).toHaveBeenCalledWith(
      'diskutil',
      ['info', 'disk0'],
      expect.objectContaining({ encoding: 'utf8', timeout: 5000, maxBuffer: 16 * 1024 * 1024 }),
      expect.any(Function)
    );
  });

  it('keeps the output of a non-zero exit', async () => {
    respond(Object.assign(new Error('Command failed'), { code: 1 }), 'partial\n', 'warning\n');
    expect(await runCommand('tmutil', ['latestbackup'], { timeoutMs: 5000 })).toEqual({
      status: 'ok',
      stdout: 'partial\n',
      stderr: 'warning\n',
      exitCode: 1
    });
  });

  it('reports a killed child as timed out', async () => {
    respond(Object.assign(new Error('killed'), { killed: true, signal: 'SIGTERM' }));
    expect(await runCommand('log', ['show'], { timeoutMs: 300, maxBufferBytes: 1024 })).toEqual({
      status: 'timed-out',
      timeoutMs: 300
    });
  });

  it('reports a tool that cannot start as failed', async () => {
    respond(Object.assign(new Error('spawn osx-cpu-temp ENOENT'), { code: 'ENOENT' }));
    expect(await runCommand('osx-cpu-temp', [], { timeoutMs: 1000 })).toEqual({
      status: 'failed',
      error: 'spawn osx-cpu-temp ENOENT'
    });
  });
});

describe('outputOf / describeOutcome', () => {
  it('treats a non-zero exit with no output as no output', () => {
    expect(outputOf({ status: 'ok', stdout: '  \n', stderr: 'boom', exitCode: 2 })).toBeNull();
    expect(outputOf({ status: 'ok', stdout: 'x', stderr: '', exitCode: 2 })).toBe('x');
    expect(outputOf({ status: 'timed-out', timeoutMs: 10 })).toBeNull();
  });

  it('describes each outcome', () => {
    expect(describeOutcome({ status: 'ok', stdout: '', stderr: '', exitCode: 3 })).toBe('exit 3');
    expect(describeOutcome({ status: 'timed-out', timeoutMs: 10 })).toBe('timed out after 10ms');
    expect(describeOutcome({ status: 'failed', error: 'nope' })).toBe('nope');
  });
});
