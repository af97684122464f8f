export * from './errors';
export { fail, ok } from './result';
export type { ServiceResult } from './result';
export { EventBus } from './event-bus';
export type {
  CardScheduledPayload,
  DomainEvent,
  EventBusConfig,
  EventHandler,
  NotificationSink,
  PayloadOf,
  SchedulingEvent,
  SchedulingEventType,
  SessionEndedPayload,
  SessionStartedPayload,
  SubscriptionOptions,
} from './event-bus';
