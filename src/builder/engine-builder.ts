import type { FieldValue } from '../types/record.js'
import type { OdsStandard } from '../types/schema.js'
import type {
  Clock,
  DateInterpreter,
  HorizonChecker,
  OdsEngineOptions,
  RecordLoader,
} from '../types/config.js'
import type { Logger, LogLevel } from '../utils/logger.js'
import { OdsEngine } from '../core/engine.js'
import { getStandard } from '../standard/ods-standard.js'
import { FieldDefinitionBuilder, StandardBuilder } from './standard-builder.js'
import { requirePlainObject } from '../utils/errors.js'

type StandardConfigurator = (
  builder: StandardBuilder
) => StandardBuilder | FieldDefinitionBuilder | void

/**
 * Fluent builder for configuring and creating an `OdsEngine`.
 *
 * @example
 * ```typescript
 * const engine = Ods.create()
 *   .standard(standard => standard
 *     .field('beam_id', { type: 'str' })
 *     .field('start', { type: 'time' })
 *     .field('stop', { type: 'time' })
 *     .start('start')
 *     .stop('stop')
 *   )
 *   .defaults({ beam_id: 'b0' })
 *   .workingInstance('schedule')
 *   .logLevel('info')
 *   .build()
 * ```
 */
export class OdsEngineBuilder {
  private options: OdsEngineOptions = {}

  /**
   * Uses a standard, by version, as built by a callback on a blank
   * `StandardBuilder`, or as given.
   */
  standard(standard: string | OdsStandard | StandardConfigurator): this {
    if (typeof standard === 'string') {
      this.options.standard = getStandard(standard)
    } else if (typeof standard === 'function') {
      const builder = new StandardBuilder()
      const result = standard(builder)
      this.options.standard = (result ?? builder).build()
    } else {
      this.options.standard = standard
    }
    return this
  }

  /**
   * Adjusts the current standard (the latest one unless set before).
   */
  extendStandard(configurator: StandardConfigurator): this {
    const builder = StandardBuilder.from(this.options.standard ?? getStandard())
    const result = configurator(builder)
    this.options.standard = (result ?? builder).build()
    return this
  }

  defaults(defaults: Record<string, FieldValue>): this {
    requirePlainObject(defaults, 'defaults')
    this.options.defaults = { ...defaults }
    return this
  }

  workingInstance(name: string): this {
    this.options.workingInstance = name
    return this
  }

  logger(logger: Logger): this {
    this.options.logger = logger
    return this
  }

  logLevel(level: LogLevel): this {
    this.options.logLevel = level
    return this
  }

  clock(clock: Clock): this {
    this.options.clock = clock
    return this
  }

  interpretDate(interpreter: DateInterpreter): this {
    this.options.interpretDate = interpreter
    return this
  }

  horizon(checker: HorizonChecker): this {
    this.options.horizon = checker
    return this
  }

  loader(loader: RecordLoader): this {
    this.options.loader = loader
    return this
  }

  build(): OdsEngine {
    return new OdsEngine({ ...this.options })
  }
}

/**
 * Main entry point.
 */
export const Ods = {
  create(): OdsEngineBuilder {
    return new OdsEngineBuilder()
  },
}
