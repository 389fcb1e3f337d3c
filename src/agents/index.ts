/**
 * agents/index.ts — Barrel export for the stateful renewal layer.
 *
 * `middleware/` holds stateless, per-page concerns (classification, fetch,
 * pacing, the SOCKS5 wire protocol).  `agents/` holds the modules that own
 * state across an attempt or across the whole process.
 */

export { RenewalEngine } from './renewalSession';
export type { RenewalEngineDeps, RenewalEngineOptions, RenewalOutcome } from './renewalSession';

export { RenewalScheduler } from './renewalScheduler';
export type { RenewalSchedulerOptions } from './renewalScheduler';

export {
  ExpirationSchedulePolicy,
  computeScheduleEntry,
  describeSchedule,
  effectiveFallbackHours,
  formatEffectiveInterval,
  statusForVerdict,
  SAFETY_MARGIN_MS,
} from './schedulePolicy';

export { ProxyCredentialManager } from './proxyCredentialManager';
export type { ProxyCredentialManagerOptions } from './proxyCredentialManager';

export { CapSolverClient, UnconfiguredSolver, formatCapSolverProxy, parseCapSolverReply } from './captchaSolver';
export type { CaptchaSolver, CapSolverOptions } from './captchaSolver';
