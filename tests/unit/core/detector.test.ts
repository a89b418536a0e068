import { chmod, mkdtemp, mkdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  detectEcosystems,
  detectRepository,
  isCiFile,
  isManifestFile,
  isTestFile,
} from '../../../src/core/detector.js';
import { DetectionError } from '../../../src/core/errors.js';

async function touch(root: string, path: string, content = ''): Promise<void> {
  await mkdir(dirname(join(root, path)), { recursive: true });
  await writeFile(join(root, path), content);
}

describe('core/detector', () => {
  describe('detectEcosystems', () => {
    it('should report ecosystems in rule order with their evidence', () => {
      const files = ['Dockerfile', 'go.mod', 'main.go', 'requirements.txt', '.github/workflows/ci.yml'];

      expect(detectEcosystems(files)).toEqual([
        { tag: 'python', evidence: 'requirements.txt' },
        { tag: 'go', evidence: 'go.mod' },
        { tag: 'docker', evidence: 'Dockerfile' },
        { tag: 'github-actions', evidence: '.github/workflows/ci.yml' },
      ]);
    });

    it('should prefer the shallowest, then first, match', () => {
      const files = ['services/api/requirements.txt', 'requirements.txt', 'requirements-dev.txt'];

      expect(detectEcosystems(files)).toEqual([{ tag: 'python', evidence: 'requirements-dev.txt' }]);
    });

    it('should try patterns in order before depth', () => {
      expect(detectEcosystems(['pyproject.toml', 'sub/requirements.txt'])).toEqual([
        { tag: 'python', evidence: 'sub/requirements.txt' },
      ]);
    });

    it('should recognise infrastructure files', () => {
      const files = ['infra/main.tf', 'k8s/base/deployment.yaml', 'App.sln', 'composer.json', 'Gemfile', 'pom.xml'];

      expect(detectEcosystems(files).map((ecosystem) => ecosystem.tag)).toEqual([
        'java',
        'ruby',
        'php',
        'dotnet',
        'terraform',
        'kubernetes',
      ]);
    });

    it('should detect nothing in an empty listing', () => {
      expect(detectEcosystems([])).toEqual([]);
    });
  });

  describe('path classifiers', () => {
    it.each([
      ['.github/workflows/ci.yml', true],
      ['.gitlab-ci.yml', true],
      ['Jenkinsfile', true],
      ['docs/ci.md', false],
    ])('isCiFile(%s) is %s', (path, expected) => {
      expect(isCiFile(path)).toBe(expected);
    });

    it.each([
      ['package.json', true],
      ['web/yarn.lock', true],
      ['go.sum', true],
      ['Dockerfile', false],
      ['src/app.py', false],
    ])('isManifestFile(%s) is %s', (path, expected) => {
      expect(isManifestFile(path)).toBe(expected);
    });

    it.each([
      ['tests/test_app.py', true],
      ['src/app.test.ts', true],
      ['pkg/handler_test.go', true],
      ['src/app.py', false],
    ])('isTestFile(%s) is %s', (path, expected) => {
      expect(isTestFile(path)).toBe(expected);
    });
  });

  describe('detectRepository', () => {
    let root: string;

    beforeEach(async () => {
      root = await mkdtemp(join(tmpdir(), 'genops-detect-'));
    });

    afterEach(async () => {
      await rm(root, { recursive: true, force: true });
    });

    it('should build a manual-mode context from the file tree', async () => {
      await touch(root, 'requirements.txt', 'flask==0.5\n');
      await touch(root, 'app.py');
      await touch(root, 'tests/test_app.py');
      await touch(root, 'node_modules/left-pad/package.json', '{}');

      const context = await detectRepository(root);

      expect(context.root).toBe(root);
      expect(context.mode).toBe('manual');
      expect(context.files).toEqual(['app.py', 'requirements.txt', 'tests/test_app.py']);
      expect(context.ecosystems).toEqual([{ tag: 'python', evidence: 'requirements.txt' }]);
      expect(context.changedFiles).toEqual([]);
      expect(context.signals).toEqual({ ciChanged: false, manifestsChanged: false, testsPresent: true, diffLines: 0 });
      expect(context.warnings).toEqual([]);
      expect(Object.isFrozen(context)).toBe(true);
    });

    it('should derive change signals from the patch in PR mode', async () => {
      await touch(root, 'package.json', '{}');
      const patch = [
        'diff --git a/package.json b/package.json',
        '--- a/package.json',
        '+++ b/package.json',
        '@@ -1 +1 @@',
        '-{}',
        '+{"name": "app"}',
        'diff --git a/.github/workflows/ci.yml b/.github/workflows/ci.yml',
        '--- a/.github/workflows/ci.yml',
        '+++ b/.github/workflows/ci.yml',
        '@@ -0,0 +1 @@',
        '+on: push',
      ].join('\n');

      const context = await detectRepository(root, { mode: 'pr', patch });

      expect(context.changedFiles).toEqual(['package.json', '.github/workflows/ci.yml']);
      expect(context.signals).toEqual({ ciChanged: true, manifestsChanged: true, testsPresent: false, diffLines: 3 });
    });

    // Permission bits do not stop root from reading
    const isRoot = process.getuid?.() === 0;

    it.skipIf(isRoot)('should skip an unreadable subtree with a warning', async () => {
      await touch(root, 'requirements.txt', 'flask==0.5\n');
      await touch(root, 'app.py');
      await touch(root, 'locked/secret.py');
      await chmod(join(root, 'locked'), 0o000);

      try {
        const context = await detectRepository(root);

        expect(context.files).toEqual(['app.py', 'requirements.txt']);
        expect(context.ecosystems).toEqual([{ tag: 'python', evidence: 'requirements.txt' }]);
        expect(context.warnings).toHaveLength(1);
        expect(context.warnings[0]).toMatch(/^Some paths could not be read and were skipped: .*EACCES/);
      } finally {
        await chmod(join(root, 'locked'), 0o755);
      }
    });

    it('should ignore changed files outside PR mode', async () => {
      const context = await detectRepository(root, { changedFiles: ['package.json'] });

      expect(context.changedFiles).toEqual([]);
    });

    it('should honour configured excludes', async () => {
      await touch(root, 'go.mod');
      await touch(root, 'examples/requirements.txt');

      const context = await detectRepository(root, { exclude: ['examples/**'] });

      expect(context.ecosystems.map((ecosystem) => ecosystem.tag)).toEqual(['go']);
    });

    it('should abort on a missing root', async () => {
      const missing = join(root, 'nope');

      await expect(detectRepository(missing)).rejects.toBeInstanceOf(DetectionError);
    });

    it('should abort when the root is a file', async () => {
      await touch(root, 'file.txt');

      await expect(detectRepository(join(root, 'file.txt'))).rejects.toThrow(
        `Cannot read repository at ${join(root, 'file.txt')}: not a directory`
      );
    });
  });
});
