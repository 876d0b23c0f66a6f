import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';

import { formatBytes } from '@bucket-sweep/core';

import type { SweepPlan } from './runner.js';

/** Resolves true only for "yes"; input that closes before an answer counts as no. */
export function promptForDeletion(io: { input: Readable; output: Writable }) {
  return async (plan: SweepPlan): Promise<boolean> => {
    const rl = createInterface({ input: io.input, output: io.output });

    // 'line' always fires before the 'close' that follows it, so the first event wins.
    const answer = await new Promise<string | null>((resolve) => {
      rl.once('line', (line) => resolve(line));
      rl.once('close', () => resolve(null));
      rl.setPrompt(
        `\nDo you want to delete ${plan.keys.length} objects (${formatBytes(plan.bytes)}) from '${plan.bucket}'? (yes/no): `,
      );
      rl.prompt();
    });
    rl.close();

    if (answer === null) {
      // eslint-disable-next-line no-console
      console.warn('[sweep] input closed before an answer; deletion cancelled', { bucket: plan.bucket });
      return false;
    }
    return answer.trim().toLowerCase() === 'yes';
  };
}
