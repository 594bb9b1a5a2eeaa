import { DirectoryEntry, RepositoryStructure } from './types';

/**
 * Filename heuristics for repository structure and test discovery.
 * Matching is on lower-cased base names.
 */

const README_PREFIX = 'readme';
const LICENSE_PREFIXES = ['license', 'licence', 'copying'];
const DOCKER_FILES = ['dockerfile', 'docker-compose.yml', 'docker-compose.yaml'];
const CI_ENTRIES = [
  '.github',
  '.circleci',
  '.gitlab-ci.yml',
  '.travis.yml',
  'jenkinsfile',
  'azure-pipelines.yml',
  'bitbucket-pipelines.yml',
];
const REQUIREMENTS_FILES = ['requirements.txt', 'pyproject.toml', 'setup.py', 'pipfile'];

const TEST_DIRECTORY_NAMES = ['test', 'tests', 'spec', 'specs', '__tests__', 'testing', 'e2e'];

/** Also matches compound names such as unit_tests or integration-tests */
const TEST_DIRECTORY_PATTERN = /(^|[_-])tests?([_-]|$)/;

/**
 * test_x.py, x_test.go, x.test.ts, x.spec.ts, XTest.java
 */
const TEST_FILE_PATTERNS: ReadonlyArray<RegExp> = [
  /^test_.+\.[^.]+$/i,
  /^.+_test\.[^.]+$/i,
  /^.+\.test\.[^.]+$/i,
  /^.+\.spec\.[^.]+$/i,
  /^.+Test\.(java|kt|scala|cs|php)$/,
];

export function baseName(path: string): string {
  const segments = path.split('/');
  return segments[segments.length - 1];
}

export function parentDirectory(path: string): string {
  const index = path.lastIndexOf('/');
  return index === -1 ? '' : path.slice(0, index);
}

export function isTestDirectoryName(name: string): boolean {
  const lower = name.toLowerCase();
  return TEST_DIRECTORY_NAMES.includes(lower) || TEST_DIRECTORY_PATTERN.test(lower);
}

export function isTestFileName(name: string): boolean {
  return TEST_FILE_PATTERNS.some((pattern) => pattern.test(name));
}

/**
 * A path is a test when its file name matches a test pattern or any of its
 * directories is a test directory
 */
export function isTestPath(path: string): boolean {
  const segments = path.split('/');
  const file = segments.pop() ?? '';
  return isTestFileName(file) || segments.some((segment) => isTestDirectoryName(segment));
}

/**
 * Lower-cased file name without extension and without test markers, so that
 * src/helper.py and tests/test_helper.py share the stem "helper"
 */
export function fileStem(path: string): string {
  let name = baseName(path);

  const javaStyle = /^(.+)Test\.[^.]+$/.exec(name);
  if (javaStyle) {
    return javaStyle[1].toLowerCase();
  }

  name = name.toLowerCase();
  const dot = name.indexOf('.', 1);
  let stem = dot === -1 ? name : name.slice(0, dot);

  if (stem.startsWith('test_')) {
    stem = stem.slice('test_'.length);
  } else if (stem.endsWith('_test')) {
    stem = stem.slice(0, -'_test'.length);
  }

  return stem;
}

/**
 * Structural scan of a repository root listing
 */
export function analyzeRootStructure(entries: DirectoryEntry[]): RepositoryStructure {
  const names = entries.map((entry) => entry.name.toLowerCase());
  const testDirectories = entries
    .filter((entry) => entry.type === 'dir' && isTestDirectoryName(entry.name))
    .map((entry) => entry.path);
  const rootTestFiles = entries.filter(
    (entry) => entry.type === 'file' && isTestFileName(entry.name),
  );

  return {
    has_readme: names.some((name) => name.startsWith(README_PREFIX)),
    has_license: names.some((name) => LICENSE_PREFIXES.some((prefix) => name.startsWith(prefix))),
    has_dockerfile: names.some((name) => DOCKER_FILES.includes(name)),
    has_ci_config: names.some((name) => CI_ENTRIES.includes(name)),
    has_tests: testDirectories.length > 0 || rootTestFiles.length > 0,
    has_package_json: names.includes('package.json'),
    has_requirements: names.some((name) => REQUIREMENTS_FILES.includes(name)),
    root_files: entries.filter((entry) => entry.type === 'file').map((entry) => entry.name),
    test_directories: testDirectories,
  };
}
