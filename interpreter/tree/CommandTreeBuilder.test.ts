import { describe, it, expect } from 'vitest';
import { vaultSpec } from '@tests/utils/sample-specs';
import { mockFetch, type MockResponse } from '@tests/utils/mock-fetch';
import { captureIO } from '@tests/utils/output-buffer';
import { literal, type Specification } from '@core/types/spec';
import { ArgumentCountError, RenderError } from '@core/errors';
import { HttpStepClient } from '@interpreter/http/HttpStepClient';
import { buildCommandTree, type CommandNode } from './CommandTreeBuilder';
import { runCommandTree } from './commander-binding';

function child(node: CommandNode, ...names: string[]): CommandNode {
  let current = node;
  for (const name of names) {
    const next = current.children.find(candidate => candidate.name === name);
    if (!next) {
      throw new Error(`no command ${name}`);
    }
    current = next;
  }
  return current;
}

async function run(argv: string[], responses: MockResponse[] = [], options: { env?: Record<string, string>; signal?: AbortSignal } = {}) {
  const { fetch, calls } = mockFetch(responses);
  const tree = buildCommandTree(vaultSpec, { env: options.env ?? {}, client: new HttpStepClient({ fetch }) });
  const io = captureIO();
  const code = await runCommandTree(tree, argv, { ...io, signal: options.signal });
  return { code, stdout: io.stdout.text, stderr: io.stderr.text, calls };
}

describe('buildCommandTree', () => {
  it('mirrors the command tree with usage strings and arity rules', () => {
    const tree = buildCommandTree(vaultSpec, { env: {} });
    expect(tree.name).toBe('vault');
    expect(tree.children.map(node => node.name)).toEqual(['kv', 'login', 'status', 'peers']);

    const kv = child(tree, 'kv');
    expect(kv.run).toBeUndefined();
    expect(kv.arity).toBeUndefined();

    const get = child(tree, 'kv', 'get');
    expect(get.usage).toBe('get <path> [version]');
    expect(get.path).toEqual(['vault', 'kv', 'get']);
    expect(get.arity).toEqual({ kind: 'minimum', count: 1 });
    expect(get.flags.map(cell => cell.spec.name)).toEqual(['mount']);
    expect(tree.flags.map(cell => cell.spec.name)).toEqual(['address', 'token']);
  });

  it('prefers a non-empty environment value over the declared default', () => {
    expect(buildCommandTree(vaultSpec, { env: { VAULT_ADDR: 'http://env.test' } }).flags[0].defaultValue).toBe('http://env.test');
    expect(buildCommandTree(vaultSpec, { env: { VAULT_ADDR: '' } }).flags[0].defaultValue).toBe('http://vault.test');
  });

  it('validates positional counts', () => {
    const tree = buildCommandTree(vaultSpec, { env: {} });
    const put = child(tree, 'kv', 'put');
    const get = child(tree, 'kv', 'get');

    expect(() => put.validateArgs([])).toThrow(ArgumentCountError);
    expect(() => put.validateArgs(['a'])).toThrow('accepts 2 args, received 1');
    expect(() => put.validateArgs(['a', 'b'])).not.toThrow();
    expect(() => put.validateArgs(['a', 'b', 'c'])).toThrow('accepts 2 args, received 3');

    expect(() => get.validateArgs([])).toThrow('requires at least 1 arg, only received 0');
    expect(() => get.validateArgs(['a'])).not.toThrow();
    expect(() => get.validateArgs(['a', 'b', 'c'])).not.toThrow();
  });

  it('rejects unknown output formats while building', () => {
    const spec: Specification = {
      name: 'x',
      flags: [],
      commands: [{ name: 'y', args: [], flags: [], commands: [], action: { steps: [{ name: 's', url: literal('u') }], output: { format: 'yaml' } } }]
    };
    expect(() => buildCommandTree(spec, { env: {} })).toThrow(RenderError);
  });
});

describe('runCommandTree', () => {
  it('resolves flags, local flags and args into the request', async () => {
    const result = await run(
      ['--token', 'test-token', '-a', 'http://h', 'kv', 'get', '--mount', 'kv2', 'app/db', '3'],
      [{ body: { data: { data: { user: 'u', password: 'test-secret' } } } }]
    );

    expect(result.code).toBe(0);
    expect(result.calls).toEqual([
      { method: 'GET', url: 'http://h/v1/kv2/data/app/db?version=3', headers: { 'x-vault-token': 'test-token' }, body: undefined }
    ]);
    expect(result.stdout).toBe('{\n  "user": "u",\n  "password": "test-secret"\n}\n');
  });

  it('falls back to environment values and defaults', async () => {
    const result = await run(['kv', 'get', 'app'], [{ body: { data: { data: null } } }], { env: { VAULT_TOKEN: 'env-token' } });
    expect(result.calls[0].url).toBe('http://vault.test/v1/secret/data/app?version=');
    expect(result.calls[0].headers).toEqual({ 'x-vault-token': 'env-token' });
    expect(result.stdout).toBe('null\n');
  });

  it('feeds earlier step results into later steps and the output', async () => {
    const result = await run(['kv', 'put', 'app', 'v1'], [{ body: { data: { version: 3 } } }, { status: 204 }]);

    expect(result.calls.map(call => `${call.method} ${call.url}`)).toEqual([
      'POST http://vault.test/v1/secret/data/app',
      'GET http://vault.test/v1/secret/metadata/app?version=3'
    ]);
    expect(result.calls[0].body).toBe('{"data":{"value":"v1"}}');
    expect(result.stdout).toBe('version 3 (204)\n');
  });

  it('renders lists as compact JSON text with upper-cased custom methods', async () => {
    const result = await run(['kv', 'keys'], [{ body: { data: { keys: ['a', 'b/'] } } }]);
    expect(result.calls[0].method).toBe('LIST');
    expect(result.calls[0].url).toBe('http://vault.test/v1/secret/metadata/');
    expect(result.stdout).toBe('["a","b/"]\n');
  });

  it('sends jsonencode output verbatim and shows the last step by default', async () => {
    const result = await run(['kv', 'copy', 'app'], [{ body: { data: { k: 'v' } } }, { body: { ok: true }, headers: { 'content-type': 'application/json' } }]);
    expect(result.calls[1]).toEqual({ method: 'PUT', url: 'http://vault.test/v1/audit', headers: {}, body: '{"k":"v"}' });
    expect(result.stdout).toBe(
      '{\n  "body": {\n    "ok": true\n  },\n  "status": 200,\n  "headers": {\n    "content-type": "application/json"\n  }\n}\n'
    );
  });

  it('renders tables', async () => {
    const result = await run(['status'], [{ body: { nodes: [{ id: 'n1', name: 'alpha', status: 'up', extra: 1 }, { id: 'n2', name: 'beta' }] } }]);
    expect(result.stdout).toBe('id\tname\tstatus\nn1\talpha\tup\nn2\tbeta\t\n');
  });

  it('reports table shape errors', async () => {
    const result = await run(['peers'], [{ body: { x: 1 } }]);
    expect(result.code).toBe(1);
    expect(result.stderr).toBe('Error: table output requires an array\n');
    expect(result.stdout).toBe('');
  });

  it('stops at the first failing step and names it', async () => {
    const result = await run(['kv', 'put', 'app', 'v1'], [{ status: 500, body: 'boom' }, { body: {} }]);
    expect(result.code).toBe(1);
    expect(result.stderr).toBe('Error: step "write" failed: HTTP 500: boom\n');
    expect(result.stdout).toBe('');
    expect(result.calls).toHaveLength(1);
  });

  it('enforces required flags before any request', async () => {
    const missing = await run(['login']);
    expect(missing.code).toBe(1);
    expect(missing.stderr).toBe('Error: required flag(s) "role" not set\n');
    expect(missing.calls).toEqual([]);

    const given = await run(['login', '-r', 'admin'], [{ body: { auth: { client_token: 's.test-token' } } }]);
    expect(given.calls[0].body).toBe('{"role":"admin"}');
    expect(given.stdout).toBe('s.test-token\n');
  });

  it('reports arity violations with the shared wording', async () => {
    const result = await run(['kv', 'put', 'only-one']);
    expect(result.code).toBe(1);
    expect(result.stderr).toBe('Error: accepts 2 args, received 1\n');
  });

  it('surfaces cancellation as a step failure', async () => {
    const result = await run(['kv', 'get', 'app'], [{ hang: true }], { signal: AbortSignal.abort() });
    expect(result.code).toBe(1);
    expect(result.stderr).toBe('Error: step "read" failed: request aborted\n');
  });

  it('returns commander exit codes for help and usage errors', async () => {
    const help = await run(['--help']);
    expect(help.code).toBe(0);
    expect(help.stdout).toContain('Usage: vault');

    const unknown = await run(['nope']);
    expect(unknown.code).toBe(1);
    expect(unknown.stderr).toContain("unknown command 'nope'");
  });
});
