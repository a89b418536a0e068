import { describe, it, expect } from 'vitest';
import { PARSERS } from '../../../src/parsers/index.js';
import { SEVERITY_TABLES } from '../../../src/parsers/severity.js';
import {
  SEMGREP_SPEC,
  TOOL_REGISTRY,
  argsTemplateFor,
  getAnalyzersFor,
  listRegisteredTools,
  resolveArgs,
} from '../../../src/core/registry.js';

describe('core/registry', () => {
  it('should list the analyzers of each ecosystem in registry order', () => {
    const entries = getAnalyzersFor([
      { tag: 'javascript', evidence: 'package.json' },
      { tag: 'python', evidence: 'pyproject.toml' },
    ]);

    expect(entries.map((entry) => entry.spec.id)).toEqual(['eslint', 'npm-audit', 'ruff', 'bandit', 'pip-audit']);
    expect(entries[2].evidence).toBe('pyproject.toml');
  });

  it('should drop disabled tools', () => {
    const entries = getAnalyzersFor([{ tag: 'go', evidence: 'go.mod' }], { disabled: ['staticcheck'] });

    expect(entries.map((entry) => entry.spec.id)).toEqual(['govet', 'gosec']);
  });

  it('should append semgrep once when anything was detected', () => {
    const entries = getAnalyzersFor([{ tag: 'ruby', evidence: 'Gemfile' }], { semgrep: true });

    expect(entries.map((entry) => entry.spec.id)).toEqual(['rubocop', 'semgrep']);
    expect(entries[1].evidence).toBeUndefined();
  });

  it('should not run semgrep on a repository with no ecosystem', () => {
    expect(getAnalyzersFor([], { semgrep: true })).toEqual([]);
  });

  it('should not run semgrep when disabled by id', () => {
    const entries = getAnalyzersFor([{ tag: 'ruby', evidence: 'Gemfile' }], { semgrep: true, disabled: ['semgrep'] });

    expect(entries.map((entry) => entry.spec.id)).toEqual(['rubocop']);
  });

  it('should register unique ids with a parser and a severity table each', () => {
    const tools = listRegisteredTools();
    const ids = tools.map((tool) => tool.id);

    expect(new Set(ids).size).toBe(ids.length);
    expect(ids[ids.length - 1]).toBe(SEMGREP_SPEC.id);
    for (const tool of tools) {
      expect(PARSERS[tool.format]).toBeTypeOf('function');
      expect(SEVERITY_TABLES[tool.id]).toBeDefined();
    }
  });

  it('should freeze the registry', () => {
    expect(Object.isFrozen(TOOL_REGISTRY)).toBe(true);
    expect(Object.isFrozen(TOOL_REGISTRY.python[0])).toBe(true);
  });

  it('should substitute argument placeholders', () => {
    expect(resolveArgs(['-d', '{root}', '-r', '{manifest}', '--cache', '{tmp}/c'], { root: '/repo', manifest: 'req.txt' })).toEqual([
      '-d',
      '/repo',
      '-r',
      'req.txt',
      '--cache',
      '{tmp}/c',
    ]);
    expect(resolveArgs(['{manifest}'], { root: '/repo' })).toEqual(['.']);
    expect(resolveArgs(['{tmp}'], { root: '/repo', tmp: '/tmp/x' })).toEqual(['/tmp/x']);
  });

  describe('repository writes', () => {
    const specFor = (id: string) => {
      const spec = listRegisteredTools().find((tool) => tool.id === id);
      if (!spec) throw new Error(`no spec ${id}`);
      return spec;
    };

    it('should run ruff without its on-disk cache', () => {
      expect(specFor('ruff').args).toContain('--no-cache');
    });

    it('should send dotnet build output and intermediates to the temp dir', () => {
      const args = specFor('dotnet-build').args;

      expect(args[args.indexOf('-o') + 1]).toBe('{tmp}/out');
      expect(args).toContain('-p:BaseIntermediateOutputPath={tmp}/obj/');
      expect(args).toContain('-p:MSBuildProjectExtensionsPath={tmp}/obj/');
    });

    it('should never point an output or cache option at the root', () => {
      const writeOptions = ['-o', '--output', '--cache-dir', '--out'];
      for (const tool of listRegisteredTools()) {
        tool.args.forEach((arg, i) => {
          if (writeOptions.includes(arg) && tool.args[i + 1] !== 'json') {
            expect(tool.args[i + 1], `${tool.id} ${arg}`).toMatch(/^\{tmp\}/);
          }
          if (arg.startsWith('-p:') && arg.includes('Path=')) {
            expect(arg, tool.id).toContain('={tmp}/');
          }
        });
      }
    });
  });

  describe('argsTemplateFor', () => {
    const pipAudit = TOOL_REGISTRY.python[2];

    it('should read a requirements file with -r', () => {
      expect(argsTemplateFor(pipAudit, 'requirements-dev.txt')).toEqual([
        '-f',
        'json',
        '--progress-spinner',
        'off',
        '-r',
        '{manifest}',
      ]);
      expect(argsTemplateFor(pipAudit, 'services/api/requirements.txt').slice(-2)).toEqual(['-r', '{manifest}']);
    });

    it('should audit the project directory for other manifests', () => {
      expect(argsTemplateFor(pipAudit, 'pyproject.toml')).toEqual(['-f', 'json', '--progress-spinner', 'off', '.']);
      expect(argsTemplateFor(pipAudit, 'Pipfile').slice(-1)).toEqual(['.']);
      expect(argsTemplateFor(pipAudit).slice(-1)).toEqual(['.']);
    });

    it('should return the plain args for specs without variants', () => {
      expect(argsTemplateFor(TOOL_REGISTRY.python[1], 'requirements.txt')).toEqual([...TOOL_REGISTRY.python[1].args]);
    });
  });
});
