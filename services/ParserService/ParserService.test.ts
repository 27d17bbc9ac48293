import { describe, it, expect } from 'vitest';
import * as path from 'path';
import { literal, reference, template, objectOf } from '@core/types/spec';
import { SpecValidationError } from '@core/errors';
import { SpecParser } from './ParserService';

const document = `
name: vault
description: Secrets client
flags:
  - name: address
    short: a
    default: http://127.0.0.1:8200
    env: VAULT_ADDR
  - name: token
    required: true
commands:
  - name: kv
    commands:
      - name: get
        args:
          - name: path
            required: true
        action:
          steps:
            - name: read
              http:
                url: "\${flag.address}/v1/secret/data/\${arg.path}"
                headers:
                  X-Vault-Token: "\${flag.token}"
          output:
            format: json
            data: "\${step.read.body.data.data}"
`;

describe('SpecParser', () => {
  const parser = new SpecParser();

  it('decodes flags, nested commands, steps and output', () => {
    const spec = parser.parse(document);

    expect(spec.name).toBe('vault');
    expect(spec.flags[0]).toEqual({
      name: 'address',
      short: 'a',
      default: 'http://127.0.0.1:8200',
      env: 'VAULT_ADDR',
      description: undefined,
      required: undefined
    });
    expect(spec.flags[1].required).toBe(true);

    const get = spec.commands[0].commands[0];
    expect(get.args).toEqual([{ name: 'path', required: true }]);
    expect(get.action?.steps[0]).toEqual({
      name: 'read',
      method: undefined,
      url: template(reference('flag', 'address'), '/v1/secret/data/', reference('arg', 'path')),
      headers: objectOf({ 'X-Vault-Token': reference('flag', 'token') }),
      body: undefined
    });
    expect(get.action?.output?.data).toEqual(reference('step', 'read', 'body', 'data', 'data'));
  });

  it('accepts JSON documents and keeps scalar defaults as text', () => {
    const spec = parser.parse(
      JSON.stringify({
        name: 'svc',
        flags: [{ name: 'port', default: 8200 }],
        commands: [{ name: 'ping', action: { steps: [{ name: 'p', http: { method: 'HEAD', url: 'http://h', body: 42 } }] } }]
      })
    );
    expect(spec.flags[0].default).toBe('8200');
    expect(spec.commands[0].action?.steps[0].body).toEqual(literal(42));
    expect(spec.commands[0].action?.steps[0].method).toBe('HEAD');
  });

  it('reports every structural problem at once', () => {
    const bad = `
commands:
  - name: get
    action:
      steps:
        - name: read
        - name: write
          http:
            url: "\${nope.x}"
`;
    let caught: unknown;
    try {
      parser.parse(bad, 'bad.yaml');
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(SpecValidationError);
    expect(caught).toHaveProperty('issues', [
      'specification: "name" is required',
      'step "read": missing "http" block',
      'step "write" url: unknown namespace "nope" in "${nope.x}" (expected flag, arg, step)'
    ]);
  });

  it('wraps YAML syntax errors', () => {
    expect(() => parser.parse('name: [unclosed', 'broken.yaml')).toThrow(SpecValidationError);
  });

  it('loads files from disk', async () => {
    const spec = await parser.parseFile(path.join(__dirname, '../../tests/fixtures/vault.yaml'));
    expect(spec.name).toBe('vault');
    expect(spec.commands.map(command => command.name)).toEqual(['kv', 'status']);
  });

  it('reports unreadable files', async () => {
    await expect(parser.parseFile('/nonexistent/spec.yaml')).rejects.toThrow(
      /^invalid specification \/nonexistent\/spec\.yaml: cannot read file/
    );
  });
});
