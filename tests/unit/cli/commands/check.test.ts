import { describe, it, expect } from 'vitest';
import { executeCheckCommand } from '../../../../src/cli/commands/check.js';
import type { CheckCommandDeps } from '../../../../src/cli/commands/check.js';
import type { ReadConfigFileResult } from '../../../../src/application/use-cases/read-config-file.js';
import { compileLinkerDocument } from '../../../../src/document/linker-reader.js';
import { testRegistries } from '../../../helpers/test-container.js';

const registries = testRegistries();

function depsWith(file: ReadConfigFileResult): CheckCommandDeps {
  return {
    readConfigFile: () => file,
    compile: (text, source) => compileLinkerDocument(text, source, { registries }),
  };
}

const read = (content: string): ReadConfigFileResult => ({
  kind: 'read',
  filePath: 'linker.yaml',
  resolvedPath: '/work/linker.yaml',
  content,
});

describe('executeCheckCommand', () => {
  it('leaves out the namers of a linker without any', () => {
    const result = executeCheckCommand('linker.yaml', depsWith(read('routers:\n  - protocol: thrift\n    servers:\n      - {}\n')));
    expect(result.output.sections?.map((s) => s.title)).toEqual(['Routers', 'Admin']);
  });

  it('prints the topology of a valid linker', () => {
    const content = [
      'namers:',
      '  - kind: fs',
      '    rootDir: /srv/disco',
      'baseDtab: /svc => /fs',
      'routers:',
      '  - protocol: http',
      '    servers:',
      '      - port: 4140',
      '      - ip: any',
      '        port: 4143',
      '        tls:',
      '          certPath: /etc/edge.pem',
      '          keyPath: /etc/edge.key',
      '  - protocol: thrift',
      '    baseDtab: ""',
      '    servers:',
      '      - {}',
      '',
    ].join('\n');

    expect(executeCheckCommand('linker.yaml', depsWith(read(content)))).toEqual({
      kind: 'success',
      output: {
        message: 'Linker configuration is valid: linker.yaml',
        sections: [
          {
            title: 'Routers',
            lines: [
              'http [http] /http on 127.0.0.1:4140, 0.0.0.0:4143 (tls) dtab /svc=>/fs',
              'thrift [thrift] /thrift on 127.0.0.1:4114',
            ],
          },
          { title: 'Namers', lines: ['fs at /fs'] },
          { title: 'Admin', lines: ['0.0.0.0:9990'] },
        ],
      },
    });
  });

  it('lists every problem of a rejected linker with hints', () => {
    const content = 'routers:\n  - protocol: http\n    servers:\n      - port: 0\n';

    expect(executeCheckCommand('linker.yaml', depsWith(read(content)))).toEqual({
      kind: 'failure',
      exitCode: { kind: 'general_error' },
      output: {
        message: 'Linker configuration rejected: linker.yaml',
        sections: [
          {
            title: 'Found 2 errors',
            lines: [
              'routers[0].servers[0].port: invalid port 0 (expected an integer in 1..65535)',
              'linker must have at least one router',
            ],
          },
        ],
        suggestions: [
          'Use a port between 1 and 65535, or omit it to use the protocol default',
          'Add a "routers" list with at least one valid router',
        ],
      },
    });
  });

  it('does not repeat a hint', () => {
    const content = [
      'routers:',
      '  - protocol: http',
      '    servers:',
      '      - port: 0',
      '  - protocol: thrift',
      '    servers:',
      '      - port: 0',
      '',
    ].join('\n');
    const result = executeCheckCommand('linker.yaml', depsWith(read(content)));
    expect(result.kind === 'failure' ? result.output.suggestions : undefined).toEqual([
      'Use a port between 1 and 65535, or omit it to use the protocol default',
      'Add a "routers" list with at least one valid router',
    ]);
    expect(result.output.sections?.map((s) => s.title)).toEqual(['Found 3 errors']);
  });

  it('reports a single error in the singular', () => {
    const result = executeCheckCommand('linker.yaml', depsWith(read('routers: []\n')));
    expect(result.output.sections).toEqual([{ title: 'Found 1 error', lines: ['linker must have at least one router'] }]);
  });

  it('treats a missing file as misuse', () => {
    expect(executeCheckCommand('gone.yaml', depsWith({ kind: 'file_not_found', filePath: 'gone.yaml' }))).toEqual({
      kind: 'failure',
      exitCode: { kind: 'misuse' },
      output: {
        message: 'File not found: gone.yaml',
        sections: undefined,
        suggestions: ['Check the file path and try again'],
      },
    });
  });

  it('treats an unreadable file as misuse', () => {
    const denied = executeCheckCommand(
      'locked.yaml',
      depsWith({ kind: 'read_error', filePath: 'locked.yaml', message: 'EACCES: permission denied', code: 'EACCES' }),
    );
    expect(denied.kind === 'failure' ? [denied.exitCode.kind, denied.output.message] : undefined).toEqual([
      'misuse',
      'Permission denied: locked.yaml',
    ]);

    const broken = executeCheckCommand(
      'dir.yaml',
      depsWith({ kind: 'read_error', filePath: 'dir.yaml', message: 'EISDIR: illegal operation on a directory' }),
    );
    expect(broken.output.sections).toEqual([{ title: 'Cause', lines: ['EISDIR: illegal operation on a directory'] }]);
  });
});
