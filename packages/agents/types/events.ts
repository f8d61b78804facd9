// Pipeline lifecycle events, emitted on an in-process bus

export type DomainEventType =
  | 'AnalysisRequested'
  | 'PhaseStarted'
  | 'PhaseCompleted'
  | 'PhaseFailed'
  | 'PhaseSkipped'
  | 'AnalysisCompleted';

export const DOMAIN_EVENT_TYPES: readonly DomainEventType[] = [
  'AnalysisRequested',
  'PhaseStarted',
  'PhaseCompleted',
  'PhaseFailed',
  'PhaseSkipped',
  'AnalysisCompleted',
];

export interface DomainEvent<T = unknown> {
  eventId: string;
  type: DomainEventType;
  timestamp: Date;
  sourceContext: string;
  payload: T;
}

export interface EventBus {
  emit(event: DomainEvent): void;
  on(type: DomainEventType, handler: (event: DomainEvent) => void): void;
  off(type: DomainEventType, handler: (event: DomainEvent) => void): void;
}

export class SimpleEventBus implements EventBus {
  private handlers = new Map<DomainEventType, Set<(event: DomainEvent) => void>>();

  emit(event: DomainEvent): void {
    const typeHandlers = this.handlers.get(event.type);
    if (typeHandlers) {
      for (const handler of typeHandlers) {
        handler(event);
      }
    }
  }

  on(type: DomainEventType, handler: (event: DomainEvent) => void): void {
    let typeHandlers = this.handlers.get(type);
    if (!typeHandlers) {
      typeHandlers = new Set();
      this.handlers.set(type, typeHandlers);
    }
    typeHandlers.add(handler);
  }

  off(type: DomainEventType, handler: (event: DomainEvent) => void): void {
    this.handlers.get(type)?.delete(handler);
  }
}
