import type { Expression, OutputFormat } from '@core/types/spec';
import { walkCommands, type ProgramPlan } from '@core/evaluation';

/**
 * Optional support routines of a generated program.
 */
export type Feature =
  | 'env-fallback'
  | 'http'
  | 'display'
  | 'records'
  | 'path-lookup'
  | 'json-encode'
  | 'render-json'
  | 'render-table'
  | 'render-text';

export const RENDER_FEATURE: Record<OutputFormat, Feature> = {
  json: 'render-json',
  table: 'render-table',
  text: 'render-text'
};

/** Routines a routine calls itself */
const IMPLIES: Record<Feature, readonly Feature[]> = {
  'env-fallback': [],
  http: ['display', 'records'],
  display: [],
  records: [],
  'path-lookup': ['records'],
  'json-encode': [],
  'render-json': [],
  'render-table': ['display', 'records'],
  'render-text': ['display']
};

/**
 * One pass over the whole program collecting every routine the generated
 * source will call, closed over the routines those call in turn.
 */
export function scanFeatures(program: ProgramPlan): Set<Feature> {
  const features = new Set<Feature>();

  for (const command of walkCommands(program.root)) {
    if (command.flags.some(flag => flag.env)) {
      features.add('env-fallback');
    }
    const action = command.action;
    if (!action) {
      continue;
    }
    for (const step of action.steps) {
      features.add('http');
      scanExpression(step.url, features);
      if (step.headers) scanExpression(step.headers, features);
      if (step.body) scanExpression(step.body, features);
    }
    if (action.output) {
      features.add(RENDER_FEATURE[action.output.format]);
      if (action.output.data) scanExpression(action.output.data, features);
    }
  }

  return closeOver(features);
}

function scanExpression(expression: Expression, features: Set<Feature>): void {
  switch (expression.type) {
    case 'literal':
      return;
    case 'reference':
      if (expression.namespace === 'step' && expression.path.length > 0) {
        features.add('path-lookup');
      }
      return;
    case 'template':
      features.add('display');
      for (const part of expression.parts) {
        if (part.type !== 'text') scanExpression(part, features);
      }
      return;
    case 'object':
      for (const entry of expression.entries) {
        scanExpression(entry.value, features);
      }
      return;
    case 'call':
      features.add('json-encode');
      scanExpression(expression.argument, features);
      return;
  }
}

function closeOver(features: Set<Feature>): Set<Feature> {
  const pending = [...features];
  while (pending.length > 0) {
    const feature = pending.pop();
    if (feature === undefined) break;
    for (const implied of IMPLIES[feature]) {
      if (!features.has(implied)) {
        features.add(implied);
        pending.push(implied);
      }
    }
  }
  return features;
}
