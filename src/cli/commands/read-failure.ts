import type { CliResult } from '../types/cli-result.js';
import { failure, section } from '../types/cli-result.js';
import type { ReadConfigFileResult } from '../../application/use-cases/read-config-file.js';

type ReadFailure = Exclude<ReadConfigFileResult, { kind: 'read' }>;

/** A config file that cannot be read is a usage problem, not a rejected document. */
export function readFailure(result: ReadFailure): CliResult {
  switch (result.kind) {
    case 'file_not_found':
      return failure(`File not found: ${result.filePath}`, {
        exitCode: { kind: 'misuse' },
        suggestions: ['Check the file path and try again'],
      });

    case 'read_error':
      if (result.code === 'EACCES') {
        return failure(`Permission denied: ${result.filePath}`, {
          exitCode: { kind: 'misuse' },
          suggestions: ['Check file permissions and try again'],
        });
      }
      return failure(`Error reading file: ${result.filePath}`, {
        exitCode: { kind: 'misuse' },
        sections: [section('Cause', [result.message])],
      });
  }
}
