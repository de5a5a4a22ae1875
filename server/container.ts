/**
 * Wires the store, cache, auth and dashboard services together. The HTTP
 * layer, the entry point and the tests all build their graph here.
 */

import { AuthGate } from "./auth/authGate";
import { SessionStore } from "./auth/sessionStore";
import { CachedQueryExecutor } from "./query/cachedQueryExecutor";
import { AngleBank } from "./services/angleBank";
import { CallQueries } from "./services/callQueries";
import { SystemHealthService } from "./services/systemHealth";
import { TestimonialPipeline } from "./services/testimonialPipeline";
import type { RelationalStore } from "./store/types";
import { systemClock, type Clock } from "./utils/clock";

export interface AppServices {
  store: RelationalStore;
  clock: Clock;
  executor: CachedQueryExecutor;
  sessions: SessionStore;
  auth: AuthGate;
  calls: CallQueries;
  testimonials: TestimonialPipeline;
  angles: AngleBank;
  health: SystemHealthService;
}

export interface ServiceOptions {
  store: RelationalStore;
  allowedDomains: readonly string[];
  clock?: Clock;
  timeoutMs?: number;
}

export function createServices(options: ServiceOptions): AppServices {
  const { store } = options;
  const clock = options.clock ?? systemClock;
  const executor = new CachedQueryExecutor(store, { clock, timeoutMs: options.timeoutMs });
  const sessions = new SessionStore(store, clock);

  return {
    store,
    clock,
    executor,
    sessions,
    auth: new AuthGate(store, sessions, { allowedDomains: options.allowedDomains }),
    calls: new CallQueries(executor, store, clock),
    testimonials: new TestimonialPipeline(executor, store, clock),
    angles: new AngleBank(executor, store),
    health: new SystemHealthService(executor, clock),
  };
}
