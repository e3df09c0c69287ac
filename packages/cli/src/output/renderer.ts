import pc from 'picocolors';
import type {
  AnalysisSummary,
  CostSummary,
  GenerationSummary,
  JudgeSummary,
  QcOutcome,
} from '@contentbench/core';
import { SCORED_METRICS, type ContestResult } from '@contentbench/shared';
import { formatTable } from './table';

const seconds = (ms: number) => `${(ms / 1000).toFixed(1)}s`;

/**
 * Console output for the stage commands. In JSON mode only `json()` prints, so stdout
 * carries a single document.
 */
export class OutputRenderer {
  constructor(private readonly isJson: boolean) {}

  json(data: unknown): void {
    if (this.isJson) {
      console.log(JSON.stringify(data, null, 2));
    }
  }

  generation(summary: GenerationSummary): void {
    if (this.isJson) return;
    const failed = summary.failed > 0 ? pc.yellow(`${summary.failed} failed`) : '0 failed';
    console.log(
      `\n${pc.green('✅ Generation complete:')} ${summary.generated} generated, ${failed}, ` +
        `${summary.skipped} skipped in ${seconds(summary.durationMs)}`,
    );
    this.costs(summary.costs);
    console.log(pc.gray(`Results saved to ${summary.outputPath}`));
  }

  analysis(summary: AnalysisSummary): void {
    if (this.isJson) return;
    console.log(
      `\n${pc.green('✅ Analysis complete:')} ${summary.analyzed} record(s), ` +
        `${summary.brokenLinks} broken link(s)` +
        (summary.failed > 0 ? pc.yellow(`, ${summary.failed} with incomplete link checks`) : ''),
    );
    console.log(pc.gray(`Results saved to ${summary.outputPath}`));
  }

  judgment(summary: JudgeSummary): void {
    if (this.isJson) return;
    console.log(
      `\n${pc.green('✅ Judgment complete:')} ${summary.judged} judged, ${summary.skipped} skipped` +
        (summary.fallbacks > 0 ? pc.yellow(`, ${summary.fallbacks} sentinel score(s)`) : ''),
    );
    console.log(pc.gray(`Results saved to ${summary.outputPath}`));
  }

  contest(result: ContestResult, outputPath: string): void {
    if (this.isJson) return;
    console.log(pc.bold('\n=== Contest Results ==='));

    console.log(pc.bold('\nBounds for each metric:'));
    for (const metric of SCORED_METRICS) {
      const { min, max } = result.bounds[metric];
      console.log(`${metric}: min=${min.toFixed(2)}, max=${max.toFixed(2)}`);
    }

    console.log(pc.bold('\nModel Scores:'));
    const ranked = Object.entries(result.model_scores).sort(([, a], [, b]) => b - a);
    for (const [model, score] of ranked) {
      console.log(`${model}: ${score.toFixed(4)}`);
    }

    console.log(`\n${pc.green(`🏆 Winner: ${result.winner.model} with score ${result.winner.score.toFixed(4)}`)}`);
    console.log(pc.gray(`Results saved to ${outputPath}`));
  }

  qc(outcome: QcOutcome): void {
    if (this.isJson) return;
    const ok = outcome.status === 'approved' || outcome.status === 'approved_revised';
    const label = ok ? pc.green(`✅ ${outcome.status}`) : pc.yellow(`⚠️  ${outcome.status}`);
    console.log(`\nQC result: ${label}`);
    if (outcome.snapshot.qc_result?.tip) {
      console.log(`  Tip: ${outcome.snapshot.qc_result.tip}`);
    }
    console.log(pc.gray(`Results saved to ${outcome.path}`));
  }

  log(message: string): void {
    if (!this.isJson) {
      console.log(pc.gray(message));
    }
  }

  private costs(costs: CostSummary): void {
    const rows = Object.entries(costs.models);
    if (rows.length === 0) return;

    console.log(pc.bold('\nCost:'));
    console.log(
      formatTable(
        ['Model', 'Articles', 'In tok', 'Out tok', 'Cost (USD)'],
        [
          ...rows.map(([id, s]) => [id, s.records, s.promptTokens, s.completionTokens, s.costUsd.toFixed(4)]),
          [
            'Total',
            costs.total.records,
            costs.total.promptTokens,
            costs.total.completionTokens,
            costs.total.costUsd.toFixed(4),
          ],
        ],
      ),
    );
  }
}
