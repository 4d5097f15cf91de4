/**
 * Stable error taxonomy for constraint metadata.
 *
 * Contract checks report their outcome as one of these codes; the error
 * classes below are what the builder and instance accessors throw.
 *
 * @module errors
 */

export const MetadataErrorCode = {
  MISSING_ATTRIBUTE: 'METADATA_MISSING_ATTRIBUTE',
  INCOMPATIBLE_ATTRIBUTE_TYPE: 'METADATA_INCOMPATIBLE_ATTRIBUTE_TYPE',
  MISSING_DEFAULT: 'METADATA_MISSING_DEFAULT',
  NON_EMPTY_ARRAY_DEFAULT: 'METADATA_NON_EMPTY_ARRAY_DEFAULT',
  UNKNOWN_ATTRIBUTE: 'METADATA_UNKNOWN_ATTRIBUTE',
  SCHEMA_VIOLATION: 'METADATA_SCHEMA_VIOLATION',
  CONFIGURATION_READ: 'METADATA_CONFIGURATION_READ',
  INSTANCE_CREATION: 'METADATA_INSTANCE_CREATION',
  ACCESS_DENIED: 'METADATA_ACCESS_DENIED',
} as const;

export type MetadataErrorCode =
  (typeof MetadataErrorCode)[keyof typeof MetadataErrorCode];

/** Codes raised when a constraint type breaks the well-known attribute contract. */
export type ContractViolationCode =
  | typeof MetadataErrorCode.MISSING_ATTRIBUTE
  | typeof MetadataErrorCode.INCOMPATIBLE_ATTRIBUTE_TYPE
  | typeof MetadataErrorCode.MISSING_DEFAULT
  | typeof MetadataErrorCode.NON_EMPTY_ARRAY_DEFAULT;

export class ConstraintMetadataError extends Error {
  readonly code: MetadataErrorCode;

  constructor(code: MetadataErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConstraintMetadataError';
    this.code = code;
  }
}

export class ConstraintDefinitionError extends ConstraintMetadataError {
  readonly attributeName: string;
  readonly constraintType: string;

  constructor(
    code: ContractViolationCode,
    constraintType: string,
    attributeName: string,
    message: string
  ) {
    super(code, message);
    this.name = 'ConstraintDefinitionError';
    this.constraintType = constraintType;
    this.attributeName = attributeName;
  }
}

export class UnknownAttributeError extends ConstraintMetadataError {
  readonly attributeName: string;
  readonly constraintType: string;

  constructor(constraintType: string, attributeName: string) {
    super(
      MetadataErrorCode.UNKNOWN_ATTRIBUTE,
      `Constraint ${constraintType} has no '${attributeName}' attribute`
    );
    this.name = 'UnknownAttributeError';
    this.constraintType = constraintType;
    this.attributeName = attributeName;
  }
}

export class SchemaViolationError extends ConstraintMetadataError {
  readonly attributeName: string;
  readonly actual: unknown;

  constructor(attributeName: string, actual: unknown, message: string) {
    super(MetadataErrorCode.SCHEMA_VIOLATION, message);
    this.name = 'SchemaViolationError';
    this.attributeName = attributeName;
    this.actual = actual;
  }
}

export class ConfigurationReadError extends ConstraintMetadataError {
  readonly accessor: string;

  constructor(constraint: string, accessor: string, cause: unknown) {
    super(
      MetadataErrorCode.CONFIGURATION_READ,
      `Cannot access constraint ${constraint} element: ${accessor}`,
      { cause }
    );
    this.name = 'ConfigurationReadError';
    this.accessor = accessor;
  }
}

export class InstanceCreationError extends ConstraintMetadataError {
  constructor(message: string, cause?: unknown) {
    super(MetadataErrorCode.INSTANCE_CREATION, message, { cause });
    this.name = 'InstanceCreationError';
  }
}

export class AccessDeniedError extends ConstraintMetadataError {
  readonly permission: string;

  constructor(permission: string) {
    super(
      MetadataErrorCode.ACCESS_DENIED,
      `Access denied: '${permission}' requires a privileged scope`
    );
    this.name = 'AccessDeniedError';
    this.permission = permission;
  }
}
