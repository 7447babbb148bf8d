/**
 * Config Error Formatting for the CLI and Logs
 */

import type { ConfigError } from './config-error.js';
import { assertNever } from '../../runtime/assert-never.js';
import { formatAddress } from '../../linker/socket-address.js';

export interface FormattedConfigError {
  readonly error: ConfigError['_tag'];
  readonly message: string;
  readonly details: Record<string, unknown>;
  readonly actionable: string;
}

export function formatConfigError(error: ConfigError): FormattedConfigError {
  switch (error._tag) {
    case 'InvalidPort':
      return {
        error: error._tag,
        message: error.message,
        details: { value: error.value, location: error.location },
        actionable: 'Use a port between 1 and 65535, or omit it to use the protocol default',
      };

    case 'InvalidIp':
      return {
        error: error._tag,
        message: error.message,
        details: { value: error.value, location: error.location },
        actionable: 'Use an IPv4 or IPv6 literal, or "any" to bind every interface',
      };

    case 'MissingPath':
      return {
        error: error._tag,
        message: error.message,
        details: { location: error.location },
        actionable: 'Set a "prefix" such as /svc',
      };

    case 'InvalidPath':
      return {
        error: error._tag,
        message: error.message,
        details: { text: error.text, cause: error.cause, location: error.location },
        actionable: 'Paths start with "/" and have non-empty segments, e.g. /http/1.1',
      };

    case 'InvalidDtab':
      return {
        error: error._tag,
        message: error.message,
        details: { text: error.text, cause: error.cause, location: error.location },
        actionable: 'Dtab entries look like "/prefix => /destination;"',
      };

    case 'InvalidParameter':
      return {
        error: error._tag,
        message: error.message,
        details: { name: error.name, reason: error.reason, location: error.location },
        actionable: `Fix the value of "${error.name}"`,
      };

    case 'ConflictingPorts':
    case 'ConflictingServers':
      return {
        error: error._tag,
        message: error.message,
        details: {
          first: formatAddress(error.first),
          second: formatAddress(error.second),
          location: error.location,
        },
        actionable: 'Give each server a distinct port, or bind them to distinct non-wildcard addresses',
      };

    case 'DuplicateRouterLabel':
      return {
        error: error._tag,
        message: error.message,
        details: { label: error.label, location: error.location },
        actionable: `Set a distinct "label" on one of the routers named '${error.label}'`,
      };

    case 'NoRoutersSpecified':
      return {
        error: error._tag,
        message: error.message,
        details: {},
        actionable: 'Add a "routers" list with at least one valid router',
      };

    case 'UnknownParameter':
      return {
        error: error._tag,
        message: error.message,
        details: { name: error.name, location: error.location },
        actionable: `Remove "${error.name}" or check its spelling`,
      };

    case 'MissingRequiredField':
      return {
        error: error._tag,
        message: error.message,
        details: { name: error.name, location: error.location },
        actionable: `Add "${error.name}"`,
      };

    case 'PluginNotFound':
      return {
        error: error._tag,
        message: error.message,
        details: { kind: error.kind, registry: error.registry, location: error.location },
        actionable: error.known.length > 0
          ? `Use one of: ${error.known.join(', ')}`
          : `No ${error.registry} plugins are registered`,
      };

    case 'ParseError':
      return {
        error: error._tag,
        message: error.message,
        details: {
          source: error.source,
          format: error.format,
          line: error.position.line,
          column: error.position.column,
        },
        actionable: `Fix ${error.format} syntax in ${error.source} at line ${error.position.line}`,
      };

    default:
      return assertNever(error);
  }
}

export function formatConfigErrorForLogs(error: ConfigError): Record<string, unknown> {
  const base: Record<string, unknown> = {
    errorTag: error._tag,
    message: error.message,
  };

  for (const [key, value] of Object.entries(error)) {
    if (key !== '_tag' && key !== 'message') {
      base[key] = value;
    }
  }

  return base;
}
