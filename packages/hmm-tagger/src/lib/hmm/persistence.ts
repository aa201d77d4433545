import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ConfigurationError } from '../errors.js';

export const modelSnapshotSchema = z.object({
  format: z.literal('hmm-tagger/1'),
  tagset: z.array(z.string()),
  vocab: z.array(z.string()),
  unigram: z.boolean(),
  A: z.array(z.array(z.number())),
  B: z.array(z.array(z.number()))
});

/** Everything needed to rebuild a model exactly; training accumulators are not part of it. */
export type ModelSnapshot = z.infer<typeof modelSnapshotSchema>;

export function writeSnapshot(file: string, snapshot: ModelSnapshot): void {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, JSON.stringify(snapshot), 'utf8');
}

export function parseSnapshot(raw: string, source = 'snapshot'): ModelSnapshot {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new ConfigurationError(`${source} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }

  const parsed = modelSnapshotSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigurationError(`${source} is not a saved hmm-tagger model`, issues);
  }
  return parsed.data;
}

export function readSnapshot(file: string): ModelSnapshot {
  return parseSnapshot(fs.readFileSync(file, 'utf8'), file);
}
