/**
 * In-process wiring for service and route tests: in-memory store,
 * fallback-only cache and a scripted code generator.
 */

import { jest } from "@jest/globals";
import { ExpiringMap, TieredCache } from "@urlkit/cache";
import { InMemoryLinkRepository } from "@urlkit/db";
import { createSilentLogger, type Logger } from "@urlkit/logger";
import { RandomShortCodeGenerator, type Clock, type ShortCodeGenerator } from "@urlkit/shared";
import { LinkService } from "../src/services/index.js";

export const BASE_URL = "http://sho.rt";

export class ManualClock implements Clock {
  constructor(private current: number) {}

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

/**
 * Hands out `codes` in order, repeating the last one once they run out.
 * Custom codes get the real validation.
 */
export class ScriptedGenerator implements ShortCodeGenerator {
  readonly generate = jest.fn((_seed: string, _length: number): string => {
    return this.codes[Math.min(this.generate.mock.calls.length - 1, this.codes.length - 1)];
  });

  private readonly validator = new RandomShortCodeGenerator({ random: { nextUint64: () => 0n } });

  constructor(private readonly codes: string[]) {}

  generateCustom(code: string): string {
    return this.validator.generateCustom(code);
  }
}

export interface Harness {
  clock: ManualClock;
  repository: InMemoryLinkRepository;
  fallback: ExpiringMap;
  cache: TieredCache;
  generator: ScriptedGenerator;
  logger: Logger;
  service: LinkService;
}

export function createHarness(codes: string[] = ["code0001", "code0002", "code0003"]): Harness {
  const clock = new ManualClock(Date.UTC(2024, 0, 15, 12, 0, 0));
  const logger = createSilentLogger();
  const repository = new InMemoryLinkRepository(clock);
  const fallback = new ExpiringMap({ clock });
  const cache = new TieredCache({ primary: null, fallback, clock, logger });
  const generator = new ScriptedGenerator(codes);

  const service = new LinkService({
    repository,
    cache,
    generator,
    baseUrl: BASE_URL,
    codeLength: 8,
    cacheTtlSeconds: 3600,
    clock,
    logger,
  });

  return { clock, repository, fallback, cache, generator, logger, service };
}
