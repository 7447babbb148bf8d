export type ReadConfigFileResult =
  | { kind: 'file_not_found'; filePath: string }
  | { kind: 'read_error'; filePath: string; message: string; code?: string }
  | { kind: 'read'; filePath: string; resolvedPath: string; content: string };

export interface ReadConfigFileDeps {
  readonly resolvePath: (filePath: string) => string;
  readonly existsSync: (resolvedPath: string) => boolean;
  readonly readFileSyncUtf8: (resolvedPath: string) => string;
}

export function createReadConfigFileUseCase(deps: ReadConfigFileDeps) {
  return function readConfigFile(filePath: string): ReadConfigFileResult {
    const resolvedPath = deps.resolvePath(filePath);

    if (!deps.existsSync(resolvedPath)) {
      return { kind: 'file_not_found', filePath };
    }

    try {
      return { kind: 'read', filePath, resolvedPath, content: deps.readFileSyncUtf8(resolvedPath) };
    } catch (e: unknown) {
      return {
        kind: 'read_error',
        filePath,
        message: e instanceof Error ? e.message : String(e),
        code: errnoCode(e),
      };
    }
  };
}

function errnoCode(e: unknown): string | undefined {
  if (typeof e !== 'object' || e === null || !('code' in e)) return undefined;
  return typeof e.code === 'string' ? e.code : undefined;
}
