// DI Container exports
export { initializeContainer, container, resetContainer } from './di/container.js';
export type { ContainerInitOptions, ImportModule } from './di/container.js';
export { DI } from './di/tokens.js';

// Compilation
export { LinkerCompiler } from './application/linker-compiler.js';
export type { DelegateError, DelegateRequest, Delegation } from './application/linker-compiler.js';
export { compileLinkerDocument, readLinker } from './document/linker-reader.js';
export type { ErrorMode, LinkerResult, ReadLinkerOptions } from './document/linker-reader.js';
export { readDocument, detectFormat } from './document/read-document.js';
export type { DocumentFormat } from './document/read-document.js';
export { ConfigNode } from './document/config-node.js';
export type { ConfigField } from './document/config-node.js';

// Validated views
export { describeLinker } from './linker/linker-config.js';
export type { LinkerDescription, ValidatedLinker } from './linker/linker-config.js';
export type { ValidatedRouter } from './linker/router-config.js';
export type { ValidatedServer } from './linker/server-config.js';
export type { ValidatedClient } from './linker/client-config.js';
export type { ValidatedNamer } from './linker/namer-config.js';
export type { ValidatedAdmin } from './linker/admin-config.js';
export type { SocketAddress } from './linker/socket-address.js';
export { conflicts } from './linker/socket-conflicts.js';

// Naming
export { Path } from './naming/path.js';
export { Dtab } from './naming/dtab.js';
export type { Dentry } from './naming/dtab.js';
export { NameTrees, showTree, simplify } from './naming/name-tree.js';
export type { NameTree, Weighted } from './naming/name-tree.js';
export { ResolutionStream } from './naming/resolution-stream.js';
export { composeNamers, createNameInterpreter, negativeNamer } from './naming/name-interpreter.js';
export type { BoundName, NameInterpreter, Namer, PrefixedNamer } from './naming/name-interpreter.js';

// Plugin API
export type { ProtocolPlugin, RequestIdentifier, IdentifierContext } from './plugins/protocol-plugin.js';
export type { NamerPlugin, NamerContext } from './plugins/namer-plugin.js';
export type { ClientTlsPlugin, ClientTlsPolicy, PeerCheck } from './plugins/tls-plugin.js';
export type { ParamParser } from './plugins/param-parser.js';
export { paramParser, noParams } from './plugins/param-parser.js';
export { builtinPlugins, buildRegistries } from './plugins/plugin-set.js';
export type { PluginRegistries, PluginSet } from './plugins/plugin-set.js';

// Errors
export * from './core/errors/index.js';
export type { AppError } from './errors/app-error.js';
export { formatAppError } from './errors/formatter.js';
