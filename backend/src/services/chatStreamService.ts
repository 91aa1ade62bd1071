import type { TurnEvent, TurnOutcome } from '../../../shared/types.js';
import type { Orchestrator } from '../orchestrator/index.js';

export type EventSender = (event: string, data: unknown) => void;

export function forwardTurnEvent(event: TurnEvent, sendEvent: EventSender): void {
  switch (event.type) {
    case 'state':
      sendEvent('state', { state: event.state, ...(event.reason ? { reason: event.reason } : {}) });
      return;
    case 'tool_call':
      sendEvent('tool_call', event.record);
      return;
    case 'token':
      sendEvent('token', { content: event.content });
      return;
    case 'nudge':
      sendEvent('nudge', { trigger: event.trigger });
      return;
    case 'complete':
      if (event.outcome.reason === 'fatal_error') {
        sendEvent('error', { code: event.outcome.fatalCause ?? 'unexpected', message: event.outcome.answer });
      }
      sendEvent('complete', event.outcome);
      return;
  }
}

export function handleTurnStream(orchestrator: Orchestrator, message: string, sendEvent: EventSender): Promise<TurnOutcome> {
  return orchestrator.runTurn(message, { onEvent: (event) => forwardTurnEvent(event, sendEvent) });
}
