/**
 * Configuration Errors - Discriminated Union
 *
 * Errors are data, not exceptions. Every problem found while compiling a
 * linker document is one of these; they are collected and returned, never
 * thrown across a validation boundary.
 *
 * `location` is the document path the problem was found at, e.g.
 * `routers[1].servers[0].port`.
 */

import type { SocketAddress } from '../../linker/socket-address.js';

export interface SourcePosition {
  /** 1-based */
  readonly line: number;
  /** 1-based */
  readonly column: number;
  readonly offset: number;
}

export type ConfigError =
  | FieldError
  | CrossObjectError
  | StructuralError
  | PluginNotFoundError
  | ParseError;

// ============================================================================
// Field-level errors (malformed or out-of-range values)
// ============================================================================

export type FieldError =
  | InvalidPortError
  | InvalidIpError
  | MissingPathError
  | InvalidPathError
  | InvalidDtabError
  | InvalidParameterError;

export interface InvalidPortError {
  readonly _tag: 'InvalidPort';
  readonly value: number;
  readonly location: string;
  readonly message: string;
}

export interface InvalidIpError {
  readonly _tag: 'InvalidIp';
  readonly value: string;
  readonly location: string;
  readonly message: string;
}

export interface MissingPathError {
  readonly _tag: 'MissingPath';
  readonly location: string;
  readonly message: string;
}

export interface InvalidPathError {
  readonly _tag: 'InvalidPath';
  readonly text: string;
  readonly cause: string;
  readonly location: string;
  readonly message: string;
}

export interface InvalidDtabError {
  readonly _tag: 'InvalidDtab';
  readonly text: string;
  readonly cause: string;
  readonly location: string;
  readonly message: string;
}

export interface InvalidParameterError {
  readonly _tag: 'InvalidParameter';
  readonly name: string;
  readonly reason: string;
  readonly location: string;
  readonly message: string;
}

// ============================================================================
// Cross-object errors (relationships between siblings)
// ============================================================================

export type CrossObjectError =
  | ConflictingPortsError
  | ConflictingServersError
  | DuplicateRouterLabelError;

/** A server collides with a server of an earlier, already admitted router. */
export interface ConflictingPortsError {
  readonly _tag: 'ConflictingPorts';
  readonly first: SocketAddress;
  readonly second: SocketAddress;
  readonly location: string;
  readonly message: string;
}

/** Two servers of the same router collide. */
export interface ConflictingServersError {
  readonly _tag: 'ConflictingServers';
  readonly first: SocketAddress;
  readonly second: SocketAddress;
  readonly location: string;
  readonly message: string;
}

export interface DuplicateRouterLabelError {
  readonly _tag: 'DuplicateRouterLabel';
  readonly label: string;
  readonly location: string;
  readonly message: string;
}

// ============================================================================
// Structural errors (missing sections, unknown keys)
// ============================================================================

export type StructuralError =
  | NoRoutersSpecifiedError
  | UnknownParameterError
  | MissingRequiredFieldError;

export interface NoRoutersSpecifiedError {
  readonly _tag: 'NoRoutersSpecified';
  readonly message: string;
}

export interface UnknownParameterError {
  readonly _tag: 'UnknownParameter';
  readonly name: string;
  readonly location: string;
  readonly message: string;
}

export interface MissingRequiredFieldError {
  readonly _tag: 'MissingRequiredField';
  readonly name: string;
  readonly location: string;
  readonly message: string;
}

// ============================================================================
// Plugin resolution and syntax
// ============================================================================

export type PluginRegistryKind = 'protocol' | 'namer' | 'tls';

export interface PluginNotFoundError {
  readonly _tag: 'PluginNotFound';
  readonly kind: string;
  readonly registry: PluginRegistryKind;
  readonly known: readonly string[];
  readonly location: string;
  readonly message: string;
}

export interface ParseError {
  readonly _tag: 'ParseError';
  readonly source: string;
  readonly format: 'json' | 'yaml';
  readonly details: string;
  readonly position: SourcePosition;
  readonly message: string;
}

export type ConfigErrorTag = ConfigError['_tag'];
