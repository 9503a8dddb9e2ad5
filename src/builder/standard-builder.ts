import type {
  OdsFieldDefinition,
  OdsFieldType,
  OdsStandard,
  RecordCheck,
  StandardRoles,
} from '../types/schema.js'
import {
  createStandard,
  type StandardDefinition,
} from '../standard/ods-standard.js'
import { ConfigurationError } from '../utils/errors.js'

export class FieldDefinitionBuilder {
  private definition: Partial<OdsFieldDefinition> = {}

  constructor(
    private parent: StandardBuilder,
    private fieldName: string
  ) {}

  /**
   * Sets the declared value type of this field.
   *
   * @example
   * ```typescript
   * standard(builder => builder
   *   .field('beam_id')
   *   .type('int')
   * )
   * ```
   */
  type(type: OdsFieldType): this {
    this.definition.type = type
    return this
  }

  /**
   * Marks whether records missing this field are invalid.
   */
  required(required: boolean = true): this {
    this.definition.required = required
    return this
  }

  /**
   * Restricts numeric values to an inclusive range.
   */
  range(low: number, high: number): this {
    if (low > high) {
      throw new ConfigurationError(
        `Field '${this.fieldName}' range is inverted: [${low}, ${high}]`,
        this.fieldName
      )
    }
    this.definition.range = [low, high]
    return this
  }

  description(text: string): this {
    this.definition.description = text
    return this
  }

  /**
   * Configures another field in the standard.
   */
  field(name: string): FieldDefinitionBuilder {
    this.parent.setFieldDefinition(this.fieldName, this.getDefinition())
    return this.parent.field(name)
  }

  /**
   * Completes the field and returns to the standard builder.
   */
  done(): StandardBuilder {
    this.parent.setFieldDefinition(this.fieldName, this.getDefinition())
    return this.parent
  }

  /**
   * Completes the configuration and builds the standard.
   */
  build(): OdsStandard {
    return this.done().build()
  }

  /**
   * Gets the current field definition (for internal use).
   */
  getDefinition(): OdsFieldDefinition {
    if (!this.definition.type) {
      throw new ConfigurationError(
        `Field '${this.fieldName}' must have a type`,
        this.fieldName
      )
    }
    return { ...this.definition, type: this.definition.type }
  }
}

/**
 * Fluent builder for custom standards.
 *
 * @example
 * ```typescript
 * const standard = new StandardBuilder()
 *   .version('beam-1')
 *   .field('beam_id', { type: 'str' })
 *   .field('start', { type: 'time' })
 *   .field('stop', { type: 'time' })
 *   .start('start')
 *   .stop('stop')
 *   .sortOrder(['start', 'stop', 'beam_id'])
 *   .build()
 * ```
 */
export class StandardBuilder {
  private fields: Record<string, OdsFieldDefinition> = {}
  private versionName = 'custom'
  private dataKeyName = 'ods_data'
  private startField?: string
  private stopField?: string
  private sortTerms?: string[]
  private roleFields: Partial<StandardRoles> = {}
  private checks: RecordCheck[] = []

  /**
   * Starts from an existing standard's fields, roles and keys.
   * Record-level checks are not carried over; add them with `check`.
   */
  static from(base: OdsStandard): StandardBuilder {
    const builder = new StandardBuilder()
      .version(base.version)
      .dataKey(base.dataKey)
      .start(base.start)
      .stop(base.stop)
      .sortOrder([...base.sortOrderTime])
    for (const [name, definition] of base.fields) {
      builder.field(name, definition)
    }
    builder.roleFields = { ...base.roles }
    return builder
  }

  version(version: string): this {
    this.versionName = version
    return this
  }

  /**
   * Sets the key holding the record array in an ODS document.
   */
  dataKey(key: string): this {
    this.dataKeyName = key
    return this
  }

  /**
   * Configures a field using the fluent builder pattern.
   */
  field(name: string): FieldDefinitionBuilder

  /**
   * Configures a field with a direct definition.
   */
  field(name: string, definition: OdsFieldDefinition): this

  field(
    name: string,
    definition?: OdsFieldDefinition
  ): FieldDefinitionBuilder | this {
    if (definition) {
      this.fields[name] = { ...definition }
      return this
    }
    return new FieldDefinitionBuilder(this, name)
  }

  /**
   * Sets the field definition (for internal use by FieldDefinitionBuilder).
   */
  setFieldDefinition(name: string, definition: OdsFieldDefinition): void {
    this.fields[name] = definition
  }

  start(field: string): this {
    this.startField = field
    return this
  }

  stop(field: string): this {
    this.stopField = field
    return this
  }

  /**
   * Sets the canonical sort key, which is also the duplicate key.
   */
  sortOrder(terms: string[]): this {
    this.sortTerms = [...terms]
    return this
  }

  role(role: keyof StandardRoles, field: string): this {
    this.roleFields[role] = field
    return this
  }

  /**
   * Adds a record-level validity check.
   */
  check(fn: RecordCheck): this {
    this.checks.push(fn)
    return this
  }

  /**
   * Completes the configuration and builds the standard.
   *
   * @throws {ConfigurationError} If start/stop are unset or inconsistent
   */
  build(): OdsStandard {
    if (!this.startField || !this.stopField) {
      throw new ConfigurationError(
        'A standard needs start and stop fields',
        this.startField ? 'stop' : 'start'
      )
    }
    const definition: StandardDefinition = {
      version: this.versionName,
      dataKey: this.dataKeyName,
      fields: { ...this.fields },
      start: this.startField,
      stop: this.stopField,
      sortOrderTime: this.sortTerms ?? [this.startField, this.stopField],
      roles: { ...this.roleFields },
      checks: [...this.checks],
    }
    return createStandard(definition)
  }
}
