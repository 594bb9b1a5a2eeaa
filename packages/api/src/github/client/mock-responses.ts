import {
  CommitPatchSet,
  CommitStatus,
  DirectoryEntry,
  FileContent,
  RepositoryDetails,
  RepositoryMetadata,
} from './types';
import { analyzeRootStructure } from './repository-structure';

/**
 * Deterministic offline responses used when the client runs in mock mode.
 * Every shape is complete so downstream consumers can run without credentials.
 */

const MOCK_TIMESTAMP = '2024-01-15T12:00:00Z';
const MOCK_PARENT_SHA = 'mock_parent_sha';

const MOCK_IDENTITY = {
  name: 'Mock Author',
  email: 'mock.author@example.com',
  date: MOCK_TIMESTAMP,
};

const MOCK_TREE: Record<string, DirectoryEntry[]> = {
  '': [
    { name: 'README.md', path: 'README.md', type: 'file' },
    { name: 'LICENSE', path: 'LICENSE', type: 'file' },
    { name: 'package.json', path: 'package.json', type: 'file' },
    { name: '.github', path: '.github', type: 'dir' },
    { name: 'src', path: 'src', type: 'dir' },
    { name: 'tests', path: 'tests', type: 'dir' },
  ],
  tests: [
    { name: 'test_main.py', path: 'tests/test_main.py', type: 'file' },
    { name: 'helper_test.py', path: 'tests/helper_test.py', type: 'file' },
    { name: 'unit_tests', path: 'tests/unit_tests', type: 'dir' },
    { name: 'fixtures', path: 'tests/fixtures', type: 'dir' },
  ],
  'tests/unit_tests': [
    { name: 'test_config.py', path: 'tests/unit_tests/test_config.py', type: 'file' },
  ],
  'tests/fixtures': [
    { name: 'test_data.py', path: 'tests/fixtures/test_data.py', type: 'file' },
  ],
};

export function mockCommitPatchSet(owner: string, repo: string, sha: string): CommitPatchSet {
  const patch = '@@ -1 +1,2 @@\n Hello World\n+Mock change';

  return {
    commit_data: {
      sha,
      message: 'Mock commit for offline analysis',
      author: { ...MOCK_IDENTITY },
      committer: { ...MOCK_IDENTITY },
      url: `https://api.github.com/repos/${owner}/${repo}/commits/${sha}`,
      html_url: `https://github.com/${owner}/${repo}/commit/${sha}`,
    },
    patches: { 'README.md': patch },
    files: [
      {
        filename: 'README.md',
        status: 'modified',
        additions: 1,
        deletions: 0,
        changes: 1,
        patch,
        blob_url: `https://github.com/${owner}/${repo}/blob/${sha}/README.md`,
      },
    ],
    stats: { additions: 1, deletions: 0, total: 1 },
    is_merge_commit: false,
    parent_commits: [MOCK_PARENT_SHA],
    files_truncated: false,
  };
}

export function mockFileContent(path: string): FileContent {
  const content = `# Mock content for ${path}\n`;
  return {
    content,
    encoding: 'utf-8',
    size: Buffer.byteLength(content, 'utf8'),
    sha: 'mock_blob_sha',
    type: 'file',
    is_binary: false,
    download_url: null,
    path,
  };
}

export function mockDirectoryListing(path: string): DirectoryEntry[] {
  return (MOCK_TREE[path] ?? []).map((entry) => ({ ...entry }));
}

export function mockRepositoryMetadata(owner: string, repo: string): RepositoryMetadata {
  return {
    basic_info: {
      name: repo,
      full_name: `${owner}/${repo}`,
      description: 'Mock repository',
      language: 'Python',
      size: 1024,
      default_branch: 'main',
      created_at: MOCK_TIMESTAMP,
      updated_at: MOCK_TIMESTAMP,
      stargazers_count: 0,
      forks_count: 0,
      open_issues_count: 0,
      is_private: false,
    },
    languages: { Python: 80, JavaScript: 20 },
    topics: ['mock', 'testing'],
    license: { key: 'mit', name: 'MIT License', spdx_id: 'MIT' },
    structure: analyzeRootStructure(mockDirectoryListing('')),
  };
}

export function mockCommitStatuses(context: string): CommitStatus[] {
  return [
    {
      id: 1,
      state: 'success',
      description: 'Mock status',
      context,
      target_url: null,
      created_at: MOCK_TIMESTAMP,
      updated_at: MOCK_TIMESTAMP,
    },
  ];
}

export function mockCreatedStatus(
  state: string,
  description: string,
  context: string,
  targetUrl?: string,
): CommitStatus {
  return {
    id: 1,
    state,
    description,
    context,
    target_url: targetUrl ?? null,
    created_at: MOCK_TIMESTAMP,
    updated_at: MOCK_TIMESTAMP,
  };
}

export function mockRepositoryDetails(owner: string, repo: string): RepositoryDetails {
  return {
    id: 1,
    name: repo,
    full_name: `${owner}/${repo}`,
    private: false,
    owner: { login: owner },
    default_branch: 'main',
    description: 'Mock repository',
    language: 'Python',
  };
}
