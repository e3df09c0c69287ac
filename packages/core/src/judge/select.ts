import { ConfigError, type ModelConfig } from '@contentbench/shared';

/** First judge whose family differs from the model's. */
export function selectJudge(model: Pick<ModelConfig, 'family'>, judges: readonly ModelConfig[]): ModelConfig | undefined {
  return judges.find((judge) => judge.family !== model.family);
}

/**
 * Chooses a cross-family judge for every model id found in the analysis store.
 * @throws {ConfigError} listing every model that is unconfigured or has no eligible judge
 */
export function planJudges(
  modelIds: readonly string[],
  models: readonly ModelConfig[],
  judges: readonly ModelConfig[],
): Map<string, ModelConfig> {
  const plan = new Map<string, ModelConfig>();
  const problems: string[] = [];

  for (const id of modelIds) {
    const model = models.find((m) => m.id === id);
    if (!model) {
      problems.push(`Model '${id}' is not configured, so its family is unknown`);
      continue;
    }
    const judge = selectJudge(model, judges);
    if (!judge) {
      problems.push(`No judge outside family '${model.family}' for model '${id}'`);
      continue;
    }
    plan.set(id, judge);
  }

  if (problems.length > 0) {
    throw new ConfigError(problems.join('\n'), { details: { models: [...modelIds] } });
  }
  return plan;
}
