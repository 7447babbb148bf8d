/**
 * Config Error Factories
 *
 * ConfigErr namespace for every ConfigError constructor, so that messages
 * stay consistent across the reader, the validators and the plugins.
 */

import type {
  ConfigError,
  InvalidPortError,
  InvalidIpError,
  MissingPathError,
  InvalidPathError,
  InvalidDtabError,
  InvalidParameterError,
  ConflictingPortsError,
  ConflictingServersError,
  DuplicateRouterLabelError,
  NoRoutersSpecifiedError,
  UnknownParameterError,
  MissingRequiredFieldError,
  PluginNotFoundError,
  PluginRegistryKind,
  ParseError,
  SourcePosition,
} from './config-error.js';
import type { SocketAddress } from '../../linker/socket-address.js';
import { formatAddress } from '../../linker/socket-address.js';

const at = (location: string): string => (location ? `${location}: ` : '');

export const ConfigErr = {
  // ==========================================================================
  // Field-level
  // ==========================================================================

  invalidPort: (value: number, location: string): InvalidPortError => ({
    _tag: 'InvalidPort',
    value,
    location,
    message: `${at(location)}invalid port ${value} (expected an integer in 1..65535)`,
  }),

  invalidIp: (value: string, location: string): InvalidIpError => ({
    _tag: 'InvalidIp',
    value,
    location,
    message: `${at(location)}invalid ip address "${value}"`,
  }),

  missingPath: (location: string): MissingPathError => ({
    _tag: 'MissingPath',
    location,
    message: `${at(location)}no path prefix configured`,
  }),

  invalidPath: (text: string, cause: string, location: string): InvalidPathError => ({
    _tag: 'InvalidPath',
    text,
    cause,
    location,
    message: `${at(location)}invalid path "${text}": ${cause}`,
  }),

  invalidDtab: (text: string, cause: string, location: string): InvalidDtabError => ({
    _tag: 'InvalidDtab',
    text,
    cause,
    location,
    message: `${at(location)}invalid dtab: ${cause}`,
  }),

  invalidParameter: (name: string, reason: string, location: string): InvalidParameterError => ({
    _tag: 'InvalidParameter',
    name,
    reason,
    location,
    message: `${at(location)}invalid value for "${name}": ${reason}`,
  }),

  // ==========================================================================
  // Cross-object
  // ==========================================================================

  conflictingPorts: (first: SocketAddress, second: SocketAddress, location: string): ConflictingPortsError => ({
    _tag: 'ConflictingPorts',
    first,
    second,
    location,
    message: `${at(location)}conflicting servers: ${formatAddress(first)}, ${formatAddress(second)}`,
  }),

  conflictingServers: (first: SocketAddress, second: SocketAddress, location: string): ConflictingServersError => ({
    _tag: 'ConflictingServers',
    first,
    second,
    location,
    message: `${at(location)}servers of the same router conflict: ${formatAddress(first)}, ${formatAddress(second)}`,
  }),

  duplicateRouterLabel: (label: string, location: string): DuplicateRouterLabelError => ({
    _tag: 'DuplicateRouterLabel',
    label,
    location,
    message: `${at(location)}conflicting routers named '${label}'`,
  }),

  // ==========================================================================
  // Structural
  // ==========================================================================

  noRoutersSpecified: (): NoRoutersSpecifiedError => ({
    _tag: 'NoRoutersSpecified',
    message: 'linker must have at least one router',
  }),

  unknownParameter: (name: string, location: string): UnknownParameterError => ({
    _tag: 'UnknownParameter',
    name,
    location,
    message: `${at(location)}unknown parameter: ${name}`,
  }),

  missingRequiredField: (name: string, location: string): MissingRequiredFieldError => ({
    _tag: 'MissingRequiredField',
    name,
    location,
    message: `${at(location)}missing required field "${name}"`,
  }),

  // ==========================================================================
  // Plugin resolution and syntax
  // ==========================================================================

  pluginNotFound: (
    kind: string,
    registry: PluginRegistryKind,
    known: readonly string[],
    location: string,
  ): PluginNotFoundError => ({
    _tag: 'PluginNotFound',
    kind,
    registry,
    known,
    location,
    message: known.length > 0
      ? `${at(location)}unknown ${registry} "${kind}". Known: ${known.join(', ')}`
      : `${at(location)}unknown ${registry} "${kind}"`,
  }),

  parseError: (
    source: string,
    format: 'json' | 'yaml',
    details: string,
    position: SourcePosition,
  ): ParseError => ({
    _tag: 'ParseError',
    source,
    format,
    details,
    position,
    message: `Failed to parse ${format} from ${source} at line ${position.line}, column ${position.column}: ${details}`,
  }),
} as const satisfies Record<string, (...args: never[]) => ConfigError>;
