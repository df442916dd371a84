/**
 * Service Container
 *
 * Builds the registry, scheduler, captcha store and the services on top
 * of them from config. Production wires the real gateway, solver and
 * messenger; tests pass fakes for any of them.
 */
import config from "./config";
import { CaptchaSolver, createCaptchaSolver } from "./captcha/captcha-solver";
import { Messenger } from "./messaging/messenger";
import { DayRegistry } from "./registration/day.registry";
import { DayScheduler } from "./registration/day.scheduler";
import { ManualCaptchaResolver } from "./registration/manual-captcha.resolver";
import { PendingCaptchaStore } from "./registration/pending-captcha.store";
import { RegistrationService } from "./registration/registration.service";
import { createHttpSiteGateway, SiteGatewayFactory } from "./site/site.gateway";

export interface AppServices {
  registry: DayRegistry;
  scheduler: DayScheduler;
  pendingStore: PendingCaptchaStore;
  service: RegistrationService;
  resolver: ManualCaptchaResolver;
  solver: CaptchaSolver | null;
  messenger: Messenger;
}

export interface AppServiceOverrides {
  messenger: Messenger;
  /** Omit to build the solver from config; null forces manual captchas */
  solver?: CaptchaSolver | null;
  createGateway?: SiteGatewayFactory;
}

export function createAppServices(overrides: AppServiceOverrides): AppServices {
  const registry = new DayRegistry(config.dayReleasePolicy);
  const scheduler = new DayScheduler(registry, config.maxWorkers);
  const pendingStore = new PendingCaptchaStore();
  const solver = overrides.solver === undefined ? createCaptchaSolver() : overrides.solver;
  const { messenger } = overrides;

  const service = new RegistrationService({
    registry,
    scheduler,
    pendingStore,
    messenger,
    solver,
    createGateway: overrides.createGateway ?? createHttpSiteGateway,
    assignmentMode: config.assignmentMode,
    maxAttempts: config.captchaMaxTries,
    manualFallbackOnExhaustion: config.manualFallbackOnExhaustion,
  });
  const resolver = new ManualCaptchaResolver({ pendingStore, messenger });

  return { registry, scheduler, pendingStore, service, resolver, solver, messenger };
}
