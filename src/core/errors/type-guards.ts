/**
 * Config Error Type Guards
 */

import type {
  ConfigError,
  FieldError,
  CrossObjectError,
  StructuralError,
  ParseError,
} from './config-error.js';

export function isConfigError(e: unknown): e is ConfigError {
  return typeof e === 'object' && e !== null && '_tag' in e && 'message' in e;
}

export function isFieldError(e: ConfigError): e is FieldError {
  return e._tag === 'InvalidPort'
    || e._tag === 'InvalidIp'
    || e._tag === 'MissingPath'
    || e._tag === 'InvalidPath'
    || e._tag === 'InvalidDtab'
    || e._tag === 'InvalidParameter';
}

export function isCrossObjectError(e: ConfigError): e is CrossObjectError {
  return e._tag === 'ConflictingPorts'
    || e._tag === 'ConflictingServers'
    || e._tag === 'DuplicateRouterLabel';
}

export function isStructuralError(e: ConfigError): e is StructuralError {
  return e._tag === 'NoRoutersSpecified'
    || e._tag === 'UnknownParameter'
    || e._tag === 'MissingRequiredField';
}

/** Syntax errors abort compilation: nothing structural can be said about the document. */
export function isParseError(e: ConfigError): e is ParseError {
  return e._tag === 'ParseError';
}
