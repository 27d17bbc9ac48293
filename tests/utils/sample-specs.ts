import {
  jsonencode,
  objectOf,
  reference,
  template,
  type CommandSpec,
  type Specification
} from '@core/types/spec';

const address = reference('flag', 'address');
const token = objectOf({ 'X-Vault-Token': reference('flag', 'token') });

function leaf(command: Omit<CommandSpec, 'flags' | 'commands'> & Partial<CommandSpec>): CommandSpec {
  return { flags: [], commands: [], ...command };
}

/**
 * A secrets-store client touching every expression kind, nested commands,
 * optional args, env fallbacks, a required flag and all three output formats.
 */
export const vaultSpec: Specification = {
  name: 'vault',
  description: 'Secrets client',
  flags: [
    { name: 'address', short: 'a', default: 'http://vault.test', env: 'VAULT_ADDR', description: 'Server address' },
    { name: 'token', env: 'VAULT_TOKEN', description: 'Access token' }
  ],
  commands: [
    {
      name: 'kv',
      description: 'Key/value secrets',
      args: [],
      flags: [],
      commands: [
        leaf({
          name: 'get',
          description: 'Read a secret',
          args: [{ name: 'path', required: true }, { name: 'version' }],
          flags: [{ name: 'mount', default: 'secret' }],
          action: {
            steps: [
              {
                name: 'read',
                url: template(address, '/v1/', reference('flag', 'mount'), '/data/', reference('arg', 'path'), '?version=', reference('arg', 'version')),
                headers: token
              }
            ],
            output: { format: 'json', data: reference('step', 'read', 'body', 'data', 'data') }
          }
        }),
        leaf({
          name: 'keys',
          description: 'List secret names',
          args: [{ name: 'prefix' }],
          action: {
            steps: [{ name: 'list', method: 'list', url: template(address, '/v1/secret/metadata/', reference('arg', 'prefix')) }],
            output: { format: 'text', data: reference('step', 'list', 'body', 'data', 'keys') }
          }
        }),
        leaf({
          name: 'put',
          description: 'Write a secret value',
          args: [{ name: 'path', required: true }, { name: 'value', required: true }],
          action: {
            steps: [
              {
                name: 'write',
                method: 'post',
                url: template(address, '/v1/secret/data/', reference('arg', 'path')),
                headers: token,
                body: objectOf({ data: objectOf({ value: reference('arg', 'value') }) })
              },
              {
                name: 'verify',
                url: template(address, '/v1/secret/metadata/', reference('arg', 'path'), '?version=', reference('step', 'write', 'body', 'data', 'version'))
              }
            ],
            output: {
              format: 'text',
              data: template('version ', reference('step', 'write', 'body', 'data', 'version'), ' (', reference('step', 'verify', 'status'), ')')
            }
          }
        }),
        leaf({
          name: 'copy',
          description: 'Copy a secret to an audit endpoint',
          args: [{ name: 'path', required: true }],
          action: {
            steps: [
              { name: 'read', url: template(address, '/v1/secret/data/', reference('arg', 'path')), headers: token },
              { name: 'store', method: 'put', url: template(address, '/v1/audit'), body: jsonencode(reference('step', 'read', 'body', 'data')) }
            ],
            output: { format: 'json' }
          }
        })
      ]
    },
    leaf({
      name: 'login',
      description: 'Exchange a role for a token',
      args: [],
      flags: [{ name: 'role', short: 'r', required: true }],
      action: {
        steps: [{ name: 'auth', method: 'post', url: template(address, '/v1/auth/login'), body: objectOf({ role: reference('flag', 'role') }) }],
        output: { format: 'text', data: reference('step', 'auth', 'body', 'auth', 'client_token') }
      }
    }),
    leaf({
      name: 'status',
      description: 'Show cluster nodes',
      args: [],
      action: {
        steps: [{ name: 'health', url: template(address, '/v1/sys/health') }],
        output: { format: 'table', data: reference('step', 'health', 'body', 'nodes'), columns: ['id', 'name', 'status'] }
      }
    }),
    leaf({
      name: 'peers',
      description: 'Show peers with their own columns',
      args: [],
      action: {
        steps: [{ name: 'peers', url: template(address, '/v1/sys/peers') }],
        output: { format: 'table', data: reference('step', 'peers', 'body') }
      }
    })
  ]
};
