import type { CrawlHandlers } from '../../types.js';
import { writeFailure, writePage, writeReport, writeSeedStart } from '../../util/output.js';

export function createConsoleHandlers(outputDir?: string): CrawlHandlers {
  return {
    onSeedStart: (seed, index, total) => writeSeedStart(seed, index, total),
    onPage: (record) => writePage(record),
    onFailure: (record) => writeFailure(record),
    onComplete: (report) => writeReport(report, outputDir),
  };
}

type HandlerName = keyof CrawlHandlers;

/** Runs each event through every handler set, in the order given. */
export function combineHandlers(...sets: CrawlHandlers[]): CrawlHandlers {
  const pick = <K extends HandlerName>(name: K): Array<NonNullable<CrawlHandlers[K]>> =>
    sets.flatMap((set) => {
      const handler = set[name];
      return handler ? [handler] : [];
    });

  const onPage = pick('onPage');
  const onFailure = pick('onFailure');
  const onBlocked = pick('onBlocked');
  const onSeedStart = pick('onSeedStart');
  const onSeedComplete = pick('onSeedComplete');
  const onComplete = pick('onComplete');

  return {
    onPage: async (record) => {
      for (const handler of onPage) {
        await handler(record);
      }
    },
    onFailure: async (record) => {
      for (const handler of onFailure) {
        await handler(record);
      }
    },
    onBlocked: async (event) => {
      for (const handler of onBlocked) {
        await handler(event);
      }
    },
    onSeedStart: async (seed, index, total) => {
      for (const handler of onSeedStart) {
        await handler(seed, index, total);
      }
    },
    onSeedComplete: async (report) => {
      for (const handler of onSeedComplete) {
        await handler(report);
      }
    },
    onComplete: async (report) => {
      for (const handler of onComplete) {
        await handler(report);
      }
    },
  };
}
