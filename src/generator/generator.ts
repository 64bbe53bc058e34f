import type { GeneratedCode, GeneratorInfo, StructuredQuery } from '../ir/types.js';
import type { AnalysisPlan } from '../ir/plan.js';
import { parseIntentToPlan } from '../parser/intent.js';
import { componentLogger, type Logger } from '../utils/logger.js';
import { emitFragment } from './code.js';

export const TEMPLATE_GENERATOR_VERSION = '1.0.0';

/**
 * Maps a structured query to a fragment. Implementations must be deterministic
 * for a fixed (query, `info.version`) pair; anything non-deterministic records
 * its seed in `info`.
 */
export interface CodeGenerator {
  readonly info: GeneratorInfo;
  generate(query: StructuredQuery): GeneratedCode;
}

export class TemplateCodeGenerator implements CodeGenerator {
  readonly info: GeneratorInfo = Object.freeze({ name: 'template', version: TEMPLATE_GENERATOR_VERSION });
  private readonly logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.logger = componentLogger(options.logger, 'generator');
  }

  plan(query: StructuredQuery): AnalysisPlan {
    return parseIntentToPlan(query);
  }

  generate(query: StructuredQuery): GeneratedCode {
    const plan = this.plan(query);
    const fragment = emitFragment(plan, query.queryText);
    this.logger.debug('Generated fragment', { kind: plan.kind, inputs: fragment.declaredInputs });

    return Object.freeze({
      source: fragment.source,
      declaredInputs: new Set(fragment.declaredInputs),
      generator: this.info,
    });
  }
}
