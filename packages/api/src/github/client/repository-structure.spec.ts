import {
  analyzeRootStructure,
  fileStem,
  isTestDirectoryName,
  isTestPath,
  parentDirectory,
} from './repository-structure';

describe('repository structure heuristics', () => {
  describe('isTestPath', () => {
    it.each([
      ['tests/unit/helpers.py', true],
      ['src/app.test.ts', true],
      ['src/app.spec.ts', true],
      ['pkg/server_test.go', true],
      ['test_main.py', true],
      ['src/main/java/UserServiceTest.java', true],
      ['packages/api/__tests__/index.ts', true],
      ['src/integration-tests/flow.ts', true],
      ['src/testing_utils.py', false],
      ['src/contest/entry.py', false],
      ['src/latest.ts', false],
    ])('%s -> %s', (path, expected) => {
      expect(isTestPath(path)).toBe(expected);
    });
  });

  describe('fileStem', () => {
    it.each([
      ['src/helper.py', 'helper'],
      ['tests/test_helper.py', 'helper'],
      ['pkg/helper_test.go', 'helper'],
      ['src/app.spec.ts', 'app'],
      ['src/UserServiceTest.java', 'userservice'],
      ['.eslintrc.js', '.eslintrc'],
      ['Makefile', 'makefile'],
    ])('%s -> %s', (path, expected) => {
      expect(fileStem(path)).toBe(expected);
    });
  });

  it('should recognise test directory names', () => {
    expect(isTestDirectoryName('Tests')).toBe(true);
    expect(isTestDirectoryName('unit_tests')).toBe(true);
    expect(isTestDirectoryName('src')).toBe(false);
  });

  it('should find the parent directory', () => {
    expect(parentDirectory('src/lib/util.ts')).toBe('src/lib');
    expect(parentDirectory('README.md')).toBe('');
  });

  describe('analyzeRootStructure', () => {
    it('should summarise a root listing', () => {
      const structure = analyzeRootStructure([
        { name: 'readme.rst', path: 'readme.rst', type: 'file' },
        { name: 'COPYING', path: 'COPYING', type: 'file' },
        { name: 'requirements.txt', path: 'requirements.txt', type: 'file' },
        { name: 'docker-compose.yml', path: 'docker-compose.yml', type: 'file' },
        { name: '.travis.yml', path: '.travis.yml', type: 'file' },
        { name: 'test_smoke.py', path: 'test_smoke.py', type: 'file' },
        { name: 'lib', path: 'lib', type: 'dir' },
      ]);

      expect(structure).toEqual({
        has_readme: true,
        has_license: true,
        has_dockerfile: true,
        has_ci_config: true,
        has_tests: true,
        has_package_json: false,
        has_requirements: true,
        root_files: [
          'readme.rst',
          'COPYING',
          'requirements.txt',
          'docker-compose.yml',
          '.travis.yml',
          'test_smoke.py',
        ],
        test_directories: [],
      });
    });

    it('should handle an empty repository', () => {
      expect(analyzeRootStructure([])).toMatchObject({
        has_readme: false,
        has_tests: false,
        root_files: [],
        test_directories: [],
      });
    });
  });
});
