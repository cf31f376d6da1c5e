/**
 * Shared error classes for formwire.
 *
 * Centralized here to avoid instanceof checks failing when
 * error classes are defined in multiple modules.
 */

/**
 * Thrown when a layout tree contains a node the parser cannot represent:
 * an unknown layout object, or a `Field` wrapping more than one field name.
 */
export class LayoutConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LayoutConfigurationError';
  }
}

/**
 * Thrown when a flat attribute string is not a sequence of `key="value"` pairs.
 */
export class FlatAttributeParseError extends Error {
  constructor(
    public readonly input: string,
    reason: string,
    public readonly position: number
  ) {
    super(`Invalid flat attributes at position ${position}: ${reason} (input: ${JSON.stringify(input)})`);
    this.name = 'FlatAttributeParseError';
  }
}

/**
 * Thrown when RemoteForm options are structurally invalid
 * (e.g. `exclude` is not a list of field names).
 */
export class RemoteFormOptionsError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid remote form options: ${issues.join('; ')}`);
    this.name = 'RemoteFormOptionsError';
  }
}

export class ConfigurationError extends Error {
  constructor(variable: string, reason: string) {
    super(`Invalid configuration for ${variable}: ${reason}`);
    this.name = 'ConfigurationError';
  }
}

/**
 * Thrown by a registered serializer handed a field of another type.
 */
export class FieldTypeMismatchError extends Error {
  constructor(expected: string, actual: string) {
    super(`Serializer registered for '${expected}' received a '${actual}' field`);
    this.name = 'FieldTypeMismatchError';
  }
}

export class FieldSerializerNotFoundError extends Error {
  constructor(type: string) {
    super(`No serializer registered for field type '${type}'`);
    this.name = 'FieldSerializerNotFoundError';
  }
}
