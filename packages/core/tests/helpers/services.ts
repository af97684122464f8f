import { vi } from 'vitest';
import type { NotificationSink, SchedulingEvent } from '../../src/core/event-bus';
import {
  CardService,
  ParameterStore,
  ReviewService,
  SessionOrchestrator,
  SessionRegistry,
} from '../../src/services';
import { createTestStore, type TestContext } from './fixtures';

export interface RecordingNotifier extends NotificationSink {
  events: SchedulingEvent[];
}

/**
 * 记录所有已发布事件的通知出口
 */
export function createRecordingNotifier(): RecordingNotifier {
  const events: SchedulingEvent[] = [];
  return {
    events,
    publish: vi.fn(async (event: SchedulingEvent) => {
      events.push(event);
    }),
  };
}

export interface ServiceContext extends TestContext {
  notifier: RecordingNotifier;
  parameters: ParameterStore;
  reviews: ReviewService;
  registry: SessionRegistry;
  sessions: SessionOrchestrator;
  cards: CardService;
}

export function createServices(notifier: RecordingNotifier = createRecordingNotifier()): ServiceContext {
  const context = createTestStore();
  const { store } = context;
  const parameters = new ParameterStore(store.parameters);
  const reviews = new ReviewService({ store, parameters, notifier });
  const registry = new SessionRegistry();
  const sessions = new SessionOrchestrator({ store, reviewService: reviews, notifier, registry });

  return {
    ...context,
    notifier,
    parameters,
    reviews,
    registry,
    sessions,
    cards: new CardService(store),
  };
}
