/**
 * Prompt texts sent to the agent. Templates are read and parsed once, when this
 * module is first imported; rendering never touches the filesystem.
 */
import type { RequestContext } from '../conversation-store.js';

import { renderPromptTemplate } from './templates.js';

export function buildSystemPrompt(options: { maxSteps: number }): string {
  return renderPromptTemplate('system', { maxSteps: options.maxSteps });
}

/** User turn sent after a step succeeded without finishing the task. */
export function buildContinuationTurn(outputLines: readonly string[]): string {
  return renderPromptTemplate('continueStep', { output: outputLines.join('\n') });
}

/** User turn that hands an execution error back for one corrected attempt. */
export function buildRetryTurn(error: string): string {
  return renderPromptTemplate('retryAfterError', { error });
}

export function enrichRequest(context: RequestContext, request: string): string {
  return renderPromptTemplate('requestContext', {
    snapshot: context.snapshot,
    catalog: context.catalog,
    request,
  });
}
