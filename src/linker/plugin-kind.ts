import type { ConfigError } from '../core/errors/config-error.js';
import { ConfigErr } from '../core/errors/factories.js';
import type { ConfigNode } from '../document/config-node.js';
import type { PluginRegistry } from '../plugins/plugin-registry.js';
import type { Validated } from '../validation/validated.js';
import { invalid, valid } from '../validation/validated.js';
import { childLocation, locationName } from '../validation/zod-issues.js';

/**
 * Resolve the plugin an object names through its discriminator field
 * (`protocol` for routers, `kind` for namers and client TLS).
 *
 * Everything else about the object depends on the plugin, so any problem
 * here stops that object from being read further.
 */
export function readPluginKind<P>(
  node: ConfigNode,
  key: string,
  registry: PluginRegistry<P>,
): Validated<ConfigError, P> {
  if (node.kind !== 'map') {
    return invalid(ConfigErr.invalidParameter(locationName(node.location), 'expected a mapping', node.location));
  }

  const field = node.fields().find((f) => f.key === key);
  if (field === undefined || field.node.isNull) {
    return invalid(ConfigErr.missingRequiredField(key, node.location));
  }

  const name = field.node.value();
  if (typeof name !== 'string') {
    return invalid(ConfigErr.invalidParameter(key, 'expected a string', field.node.location));
  }

  const plugin = registry.resolve(name, childLocation(node.location, key));
  return plugin.isOk() ? valid(plugin.value) : invalid(plugin.error);
}
