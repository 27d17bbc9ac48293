import { describe, it, expect } from 'vitest';
import { mockFetch } from '@tests/utils/mock-fetch';
import { captureIO } from '@tests/utils/output-buffer';
import { SpecValidationError, generateProgram, loadSpec, runSpec } from './index';

const PING = `
name: pinger
flags:
  - name: host
    default: http://ping.test
commands:
  - name: ping
    args:
      - name: target
        required: true
    action:
      steps:
        - name: probe
          http:
            url: "\${flag.host}/probe/\${arg.target}"
      output:
        format: text
        data: "\${arg.target}: \${step.probe.body.latency}ms"
`;

describe('clidef API', () => {
  it('loads and validates a document', () => {
    const spec = loadSpec(PING);
    expect(spec.name).toBe('pinger');
    expect(spec.commands.map(command => command.name)).toEqual(['ping']);
  });

  it('rejects an invalid document', () => {
    expect(() => loadSpec('name: x\ncommands:\n  - name: a\n    action:\n      steps: []\n      output:\n        format: csv\n')).toThrow(
      SpecValidationError
    );
  });

  it('runs a document against arguments', async () => {
    const { fetch, calls } = mockFetch([{ body: { latency: 12 } }]);
    const io = captureIO();

    const code = await runSpec(PING, ['ping', 'db1'], { ...io, env: {}, fetch });

    expect(code).toBe(0);
    expect(calls[0].url).toBe('http://ping.test/probe/db1');
    expect(io.stdout.text).toBe('db1: 12ms\n');
  });

  it('generates a program from a document', async () => {
    const { source } = await generateProgram(PING, { format: false });
    expect(source).toContain('const cmdPing = program.command("ping");');
  });
});
