import { readFileSync } from 'node:fs';
import { z } from 'zod';

const stopwordFile = z.object({ it: z.array(z.string()), en: z.array(z.string()) });

function loadStopwords(): ReadonlySet<string> {
  const raw = readFileSync(new URL('../../data/stopwords.json', import.meta.url), 'utf-8');
  const { it, en } = stopwordFile.parse(JSON.parse(raw));
  return new Set([...it, ...en]);
}

/** Italian and English function words ignored by frequency scoring. */
export const STOP_WORDS = loadStopwords();
