import type { Value } from '@core/types/value';
import { display, toJSON } from '@core/types/value';
import { walkAction, type ActionPlan, type StepPlan, type StepRequest } from '@core/evaluation';
import { StepExecutionError, errorMessage } from '@core/errors';
import { interpreterLogger as logger } from '@core/utils/logger';
import { Environment } from '@interpreter/env/Environment';
import { HttpAbortError, HttpStatusError, type HttpStepClient, type HttpStepRequest } from '@interpreter/http/HttpStepClient';
import { render } from '@interpreter/output/renderers';

export interface OutputSink {
  write(chunk: string): unknown;
}

export interface ActionContext {
  client: HttpStepClient;
  stdout: OutputSink;
  signal?: AbortSignal;
}

/**
 * Run an action against a fresh environment. The first failing step stops the
 * action; nothing is rendered after a failure.
 */
export async function executeAction(
  action: ActionPlan,
  env: Environment,
  context: ActionContext
): Promise<Environment> {
  await walkAction(action, env.scope(), {
    backend: env.backend,
    performStep: (step, request) => performStep(step, request, context),
    emitOutput: (output, data) => {
      context.stdout.write(render(output.format, data, output.columns));
    }
  });
  return env;
}

async function performStep(step: StepPlan, request: StepRequest<Value>, context: ActionContext): Promise<Value> {
  logger.debug('Executing step', { step: step.name, method: step.method });
  try {
    const httpRequest = toHttpRequest(step, request);
    return await context.client.send(httpRequest, context.signal);
  } catch (error) {
    logger.debug('Step failed', { step: step.name, error: errorMessage(error) });
    throw new StepExecutionError(step.name, error, {
      status: error instanceof HttpStatusError ? error.status : undefined,
      aborted: error instanceof HttpAbortError
    });
  }
}

/**
 * URL by default representation, header values likewise; string bodies are
 * sent verbatim and anything else as JSON.
 */
export function toHttpRequest(step: StepPlan, request: StepRequest<Value>): HttpStepRequest {
  const headers: Record<string, string> = {};
  if (request.headers) {
    if (request.headers.kind !== 'map') {
      throw new Error('headers must be an object');
    }
    for (const [key, value] of request.headers.entries) {
      headers[key] = display(value);
    }
  }

  let body: string | undefined;
  if (request.body) {
    body = request.body.kind === 'string' ? request.body.value : JSON.stringify(toJSON(request.body));
  }

  return { method: step.method, url: display(request.url), headers, body };
}
