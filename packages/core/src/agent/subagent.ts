/**
 * @fileoverview Sub-agent runs
 *
 * A sub-agent is an ordinary turn of the agent loop on its own session,
 * delivered to a CollectingChannel so the caller gets the text back.
 */

import type { Session } from '../types/session.js';
import type { RunOptions, TurnOutcome } from './types.js';
import type { AgentLoop } from './agent-loop.js';
import { CollectingChannel } from './collecting-channel.js';

export const SUBAGENT_CHANNEL = 'spawn';

export interface SubAgentRequest {
  jobId: string;
  task: string;
  context?: string;
}

export interface SubAgentResult {
  text: string;
  outcome: TurnOutcome;
}

export type SubAgentRunner = (request: SubAgentRequest) => Promise<SubAgentResult>;

export function buildSubAgentPrompt(request: SubAgentRequest): string {
  return request.context ? `${request.context.trim()}\n\nTask: ${request.task}` : request.task;
}

/**
 * Runner executing each request as a turn on session `spawn:<jobId>`
 */
export function createSubAgentRunner(
  loop: Pick<AgentLoop, 'run'>,
  options: Pick<RunOptions, 'model' | 'extraTools'> = {}
): SubAgentRunner {
  return async (request) => {
    const session: Session = { channel: SUBAGENT_CHANNEL, senderId: request.jobId };
    const channel = new CollectingChannel();
    const outcome = await loop.run(session, buildSubAgentPrompt(request), channel, options);
    return { text: channel.collectedText, outcome };
  };
}
