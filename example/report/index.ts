/**
 * Monthly Report Example
 *
 * Generates the AI commentary for an invoice field recognition report and
 * writes it to reports/monthly.md. Commentary falls back across OpenAI and
 * Gemini models; the closing section names the model that wrote it.
 *
 * Run with: OPENAI_API_KEY=your_key GEMINI_API_KEY=your_key npx tsx example/report/index.ts
 */

import 'dotenv/config';

import { fileURLToPath } from 'url';
import * as path from 'path';
import { fieldreport } from '../../src/index.js';
import { plan } from './plan.js';

const exampleDir = path.dirname(fileURLToPath(import.meta.url));

async function main() {
  console.log('🧾 Invoice Field Recognition Report\n');

  const result = await fieldreport.generate(plan, {
    contextDir: process.env.CONTEXT_DIR ?? path.join(exampleDir, 'context'),
  });

  const written = fieldreport.write(path.join('reports', 'monthly.md'), result.markdown);
  if (!written) {
    process.exitCode = 1;
    return;
  }

  console.log(`\nPrimary model: ${result.primaryModel ?? 'none'}`);
  for (const [model, count] of Object.entries(result.usage)) {
    console.log(`  ${model}: ${count}`);
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
