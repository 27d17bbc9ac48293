import * as fs from 'fs/promises';
import * as yaml from 'js-yaml';
import type {
  ActionSpec,
  ArgSpec,
  CommandSpec,
  Expression,
  FlagSpec,
  OutputSpec,
  Specification,
  StepSpec
} from '@core/types/spec';
import { literal } from '@core/types/spec';
import { SpecValidationError, errorMessage } from '@core/errors';
import { parserLogger as logger } from '@core/utils/logger';
import type { IParserService } from './IParserService';
import { parseTemplate, TemplateSyntaxError } from './template-parser';

type Document = Record<string, unknown>;

function isDocument(value: unknown): value is Document {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Loads specification documents. YAML is the primary syntax; JSON documents
 * parse as YAML too. Every problem found is reported at once.
 */
export class SpecParser implements IParserService {
  parse(content: string, source?: string): Specification {
    let document: unknown;
    try {
      document = yaml.load(content, { filename: source });
    } catch (error) {
      throw new SpecValidationError([errorMessage(error)], source);
    }

    const decoder = new DocumentDecoder();
    const spec = decoder.specification(document);
    if (decoder.issues.length > 0) {
      logger.debug('Specification document rejected', { source, issues: decoder.issues });
      throw new SpecValidationError(decoder.issues, source);
    }

    logger.debug('Parsed specification', { source, name: spec.name, commands: spec.commands.length });
    return spec;
  }

  async parseFile(filePath: string): Promise<Specification> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      throw new SpecValidationError([`cannot read file: ${errorMessage(error)}`], filePath);
    }
    return this.parse(content, filePath);
  }
}

class DocumentDecoder {
  readonly issues: string[] = [];

  specification(document: unknown): Specification {
    if (!isDocument(document)) {
      this.issues.push('document must be a mapping');
      return { name: '', flags: [], commands: [] };
    }
    return {
      name: this.requiredString(document, 'name', 'specification'),
      description: this.optionalString(document, 'description', 'specification'),
      flags: this.list(document, 'flags', 'specification').map((item, index) => this.flag(item, `flags[${index}]`)),
      commands: this.list(document, 'commands', 'specification').map((item, index) =>
        this.command(item, `commands[${index}]`)
      )
    };
  }

  private command(item: unknown, where: string): CommandSpec {
    if (!isDocument(item)) {
      this.issues.push(`${where}: command must be a mapping`);
      return { name: '', args: [], flags: [], commands: [] };
    }
    const name = this.requiredString(item, 'name', where);
    const at = name ? `command "${name}"` : where;
    return {
      name,
      description: this.optionalString(item, 'description', at),
      args: this.list(item, 'args', at).map((arg, index) => this.arg(arg, `${at} args[${index}]`)),
      flags: this.list(item, 'flags', at).map((flag, index) => this.flag(flag, `${at} flags[${index}]`)),
      action: item.action === undefined ? undefined : this.action(item.action, `${at} action`),
      commands: this.list(item, 'commands', at).map((child, index) => this.command(child, `${at} commands[${index}]`))
    };
  }

  private flag(item: unknown, where: string): FlagSpec {
    if (!isDocument(item)) {
      this.issues.push(`${where}: flag must be a mapping`);
      return { name: '' };
    }
    const name = this.requiredString(item, 'name', where);
    const at = name ? `flag "${name}"` : where;
    return {
      name,
      short: this.optionalString(item, 'short', at),
      default: this.optionalScalar(item, 'default', at),
      env: this.optionalString(item, 'env', at),
      description: this.optionalString(item, 'description', at),
      required: this.optionalBoolean(item, 'required', at)
    };
  }

  private arg(item: unknown, where: string): ArgSpec {
    if (!isDocument(item)) {
      this.issues.push(`${where}: arg must be a mapping`);
      return { name: '' };
    }
    return {
      name: this.requiredString(item, 'name', where),
      required: this.optionalBoolean(item, 'required', where)
    };
  }

  private action(item: unknown, where: string): ActionSpec {
    if (!isDocument(item)) {
      this.issues.push(`${where}: action must be a mapping`);
      return { steps: [] };
    }
    return {
      steps: this.list(item, 'steps', where).map((step, index) => this.step(step, `${where} steps[${index}]`)),
      output: item.output === undefined ? undefined : this.output(item.output, `${where} output`)
    };
  }

  private step(item: unknown, where: string): StepSpec {
    if (!isDocument(item)) {
      this.issues.push(`${where}: step must be a mapping`);
      return { name: '', url: literal('') };
    }
    const name = this.requiredString(item, 'name', where);
    const at = name ? `step "${name}"` : where;
    const http = item.http;
    if (!isDocument(http)) {
      this.issues.push(`${at}: missing "http" block`);
      return { name, url: literal('') };
    }
    if (http.url === undefined) {
      this.issues.push(`${at}: missing "url"`);
    }
    return {
      name,
      method: this.optionalString(http, 'method', at),
      url: http.url === undefined ? literal('') : this.expression(http.url, `${at} url`),
      headers: http.headers === undefined ? undefined : this.expression(http.headers, `${at} headers`),
      body: http.body === undefined ? undefined : this.expression(http.body, `${at} body`)
    };
  }

  private output(item: unknown, where: string): OutputSpec {
    if (!isDocument(item)) {
      this.issues.push(`${where}: output must be a mapping`);
      return {};
    }
    let columns: string[] | undefined;
    if (item.columns !== undefined) {
      if (Array.isArray(item.columns) && item.columns.every(column => typeof column === 'string')) {
        columns = item.columns;
      } else {
        this.issues.push(`${where}: "columns" must be a list of strings`);
      }
    }
    return {
      format: this.optionalString(item, 'format', where),
      data: item.data === undefined ? undefined : this.expression(item.data, `${where} data`),
      columns
    };
  }

  /**
   * Strings are templates, mappings are object constructors, other scalars are literals.
   */
  private expression(value: unknown, where: string): Expression {
    if (typeof value === 'string') {
      try {
        return parseTemplate(value);
      } catch (error) {
        if (error instanceof TemplateSyntaxError) {
          this.issues.push(`${where}: ${error.message}`);
          return literal(value);
        }
        throw error;
      }
    }
    if (value === null || typeof value === 'number' || typeof value === 'boolean') {
      return literal(value);
    }
    if (isDocument(value)) {
      return {
        type: 'object',
        entries: Object.entries(value).map(([key, entry]) => ({
          key,
          value: this.expression(entry, `${where}.${key}`)
        }))
      };
    }
    this.issues.push(`${where}: unsupported expression (expected a string, number, boolean, null or mapping)`);
    return literal(null);
  }

  private list(item: Document, key: string, where: string): unknown[] {
    const value = item[key];
    if (value === undefined || value === null) {
      return [];
    }
    if (!Array.isArray(value)) {
      this.issues.push(`${where}: "${key}" must be a list`);
      return [];
    }
    return value;
  }

  private requiredString(item: Document, key: string, where: string): string {
    const value = item[key];
    if (typeof value !== 'string' || value === '') {
      this.issues.push(`${where}: "${key}" is required`);
      return '';
    }
    return value;
  }

  private optionalString(item: Document, key: string, where: string): string | undefined {
    const value = item[key];
    if (value === undefined || value === null) {
      return undefined;
    }
    if (typeof value !== 'string') {
      this.issues.push(`${where}: "${key}" must be a string`);
      return undefined;
    }
    return value;
  }

  /** Numbers and booleans are accepted and kept as their text, e.g. `default: 8200` */
  private optionalScalar(item: Document, key: string, where: string): string | undefined {
    const value = item[key];
    if (typeof value === 'number' || typeof value === 'boolean') {
      return String(value);
    }
    return this.optionalString(item, key, where);
  }

  private optionalBoolean(item: Document, key: string, where: string): boolean | undefined {
    const value = item[key];
    if (value === undefined || value === null) {
      return undefined;
    }
    if (typeof value !== 'boolean') {
      this.issues.push(`${where}: "${key}" must be true or false`);
      return undefined;
    }
    return value;
  }
}
