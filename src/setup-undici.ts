import { Agent } from 'undici';

import type { TransportTimeouts } from './types.js';

/**
 * Dispatcher for provider requests. Only the connect phase has a hard limit here;
 * total and low-speed limits are enforced per request by the client.
 */
export function createProviderDispatcher(timeouts: Pick<TransportTimeouts, 'connectMs'>): Agent {
  const agentOptions: Agent.Options = {
    headersTimeout: 0,
    bodyTimeout: 0,
    connect: { timeout: timeouts.connectMs },
  };
  return new Agent(agentOptions);
}
