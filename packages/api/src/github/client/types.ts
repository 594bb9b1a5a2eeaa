import { JsonRecord } from '../../common/utils/json-readers';
import { GitHubErrorKind } from '../errors/github-error.types';

/**
 * Data client result shapes
 *
 * Keys mirror the GitHub REST payloads they are built from, so the scoring
 * workflow can consume them as plain JSON.
 */

export interface CommitIdentity {
  name: string;
  email: string;
  date: string;
}

export interface CommitData {
  sha: string;
  message: string;
  author: CommitIdentity | null;
  committer: CommitIdentity | null;
  url: string;
  html_url: string;
}

export interface CommitFile {
  filename: string;
  /** added, modified, removed, renamed, ... */
  status: string;
  additions: number;
  deletions: number;
  changes: number;
  /** Absent for binary files and very large diffs */
  patch?: string;
  previous_filename?: string;
  blob_url?: string;
}

export interface CommitStats {
  additions: number;
  deletions: number;
  total: number;
}

/**
 * Comparison of a merge commit against its first parent
 */
export interface MergeComparison {
  base: string;
  ahead_by: number;
  behind_by: number;
  total_commits: number;
  files: CommitFile[];
}

export interface CommitPatchSet {
  commit_data: CommitData;
  /** filename -> unified diff text */
  patches: Record<string, string>;
  files: CommitFile[];
  stats: CommitStats;
  is_merge_commit: boolean;
  parent_commits: string[];
  /** GitHub lists at most 300 files per commit */
  files_truncated: boolean;
  merge_comparison?: MergeComparison;
}

export type ContentEncoding = 'utf-8' | 'base64';

export interface FileContent {
  /** Decoded text, or the raw base64 payload when is_binary */
  content: string;
  encoding: ContentEncoding;
  size: number;
  sha: string;
  type: string;
  is_binary: boolean;
  download_url: string | null;
  path: string;
}

export interface FileFetchError {
  error: string;
  error_type: GitHubErrorKind;
}

export type FileContentResult = FileContent | FileFetchError;

export interface RepositoryBasicInfo {
  name: string;
  full_name: string;
  description: string | null;
  language: string | null;
  /** Kilobytes */
  size: number;
  default_branch: string;
  created_at: string | null;
  updated_at: string | null;
  stargazers_count: number;
  forks_count: number;
  open_issues_count: number;
  is_private: boolean;
}

export interface RepositoryLicense {
  key: string;
  name: string;
  spdx_id: string | null;
}

export interface RepositoryStructure {
  has_readme: boolean;
  has_license: boolean;
  has_dockerfile: boolean;
  has_ci_config: boolean;
  has_tests: boolean;
  has_package_json: boolean;
  has_requirements: boolean;
  root_files: string[];
  test_directories: string[];
}

export interface RepositoryMetadata {
  basic_info: RepositoryBasicInfo;
  /** language -> share of bytes in percent */
  languages: Record<string, number>;
  topics: string[];
  license: RepositoryLicense | null;
  structure: RepositoryStructure;
}

export interface TestFileReport {
  direct_test_files: string[];
  related_test_files: string[];
  test_directories: string[];
}

export interface CommitStatus {
  id: number | null;
  state: string;
  description: string | null;
  context: string;
  target_url: string | null;
  created_at: string | null;
  updated_at: string | null;
}

export interface DirectoryEntry {
  name: string;
  path: string;
  /** file, dir, symlink or submodule */
  type: string;
}

export type RepositoryDetails = JsonRecord;
