import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { ExecutionResult } from '../types/execution.js';
import type { RecipeMetadata } from '../types/recipe.js';

/** Write `summary.md` for one finished run next to its JSONL log. */
export async function writeSummary(runDir: string, recipe: RecipeMetadata, result: ExecutionResult): Promise<void> {
  await writeFile(join(runDir, 'summary.md'), buildSummaryMarkdown(recipe, result), 'utf-8');
}

export function buildSummaryMarkdown(recipe: RecipeMetadata, result: ExecutionResult): string {
  const steps = result.steps ?? [];
  const lines: string[] = [
    '# Run Summary',
    `- Recipe: ${recipe.name} ${recipe.version} (${recipe.source})`,
    `- Runtime: ${recipe.runtime}`,
    `- Result: ${result.success ? 'Success' : 'Failure'}`,
    `- Duration: ${formatDuration(result.durationMs)}`,
  ];
  if (steps.length > 0) {
    lines.push(`- Steps: ${steps.filter((s) => s.success).length}/${steps.length} passed`);
  }

  lines.push('');
  lines.push('## Key Events');
  let eventNum = 1;
  if (result.error) {
    lines.push(`${eventNum}. ${result.error.kind} - ${result.error.message}`);
    eventNum++;
  }
  for (const step of steps) {
    if (!step.success) {
      const optional = step.required ? '' : ' (optional)';
      const kind = step.error?.kind ?? 'unknown error';
      lines.push(`${eventNum}. Step "${step.recipe}"${optional}: ${kind} - ${step.error?.message ?? 'no details'}`);
      eventNum++;
    }
  }
  if (eventNum === 1) {
    lines.push('- All steps completed successfully');
  }

  return lines.join('\n') + '\n';
}

export function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${String(minutes).padStart(2, '0')}m ${String(seconds).padStart(2, '0')}s`;
}
