import * as yup from 'yup';
import { AutomatonSpecError } from './AutomatonError';

const ConfigSchema = yup.object({
  debug: yup.boolean().defined().default(false),
  epsilon: yup.string().defined().default(''),
});

export type AutomatonConfig = yup.InferType<typeof ConfigSchema>;

/**
 * Read settings from the environment.
 *
 * - `DPDA_DEBUG`: `true`/`1` turns on step tracing.
 * - `DPDA_EPSILON`: lambda marker for definitions that do not name one.
 */
export function loadConfig (env: NodeJS.ProcessEnv = process.env): AutomatonConfig {
  try {
    return ConfigSchema.validateSync({
      debug: env.DPDA_DEBUG,
      epsilon: env.DPDA_EPSILON,
    }, { abortEarly: false });
  } catch (e) {
    if (e instanceof yup.ValidationError) {
      throw new AutomatonSpecError('Invalid configuration', { validationErrors: e.errors });
    }
    throw e;
  }
}

export const config: AutomatonConfig = loadConfig();
