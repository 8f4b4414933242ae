import { z } from 'zod';
import { InvalidToolchainVersionError, LatestVersionError } from './errors.js';

export const XTENSA_RUST_LATEST_API_URL =
  'https://api.github.com/repos/esp-rs/rust-build/releases/latest';

const EXTENDED_SEMVER = /^(0|[1-9]\d*)\.(0|[1-9]\d*)\.(0|[1-9]\d*)\.(0|[1-9]\d*)$/;
const IDF_RELEASE = /^v?(\d+)\.(\d+)(?:\.(\d+))?$/;

const ReleaseSchema = z.object({ tag_name: z.string() });

// ── Xtensa Rust toolchain versions ──────────────────────────────────

export function parseToolchainVersion(version: string): string {
  if (!EXTENDED_SEMVER.test(version)) {
    throw new InvalidToolchainVersionError(version);
  }
  return version;
}

export interface FetchResponse {
  ok: boolean;
  status: number;
  statusText: string;
  json(): Promise<unknown>;
}

export type Fetcher = (
  url: string,
  init?: { headers?: Record<string, string> },
) => Promise<FetchResponse>;

export interface LatestVersionOptions {
  fetch?: Fetcher;
  /** Bearer token for the release index, raises the anonymous rate limit. */
  token?: string;
  url?: string;
}

/**
 * Queries the release index for the newest Xtensa Rust build. Does not retry.
 */
export async function getLatestToolchainVersion(opts: LatestVersionOptions = {}): Promise<string> {
  const fetcher: Fetcher = opts.fetch ?? fetch;
  const headers: Record<string, string> = {
    'User-Agent': 'espforge',
    Accept: 'application/vnd.github+json',
  };
  if (opts.token) {
    headers.Authorization = `Bearer ${opts.token}`;
  }

  let response: FetchResponse;
  try {
    response = await fetcher(opts.url ?? XTENSA_RUST_LATEST_API_URL, { headers });
  } catch (err) {
    throw new LatestVersionError(String(err), { cause: err });
  }
  if (!response.ok) {
    throw new LatestVersionError(`HTTP ${response.status} ${response.statusText}`);
  }

  const release = ReleaseSchema.safeParse(await response.json());
  if (!release.success) {
    throw new LatestVersionError('release index response has no tag_name');
  }
  const tag = release.data.tag_name;
  return parseToolchainVersion(tag.startsWith('v') ? tag.slice(1) : tag);
}

// ── ESP-IDF git references ──────────────────────────────────────────

export type GitRefKind = 'commit' | 'tag' | 'branch';

export interface GitRef {
  kind: GitRefKind;
  name: string;
}

/**
 * Parses the ESP-IDF version mini-language:
 *
 * - `commit:<hash>`, `tag:<tag>`, `branch:<name>` pin explicitly;
 * - `v<major>.<minor>` or `<major>.<minor>` (optionally `.<patch>`) is the
 *   release tag `v<major>.<minor>`;
 * - anything else is a branch name.
 *
 * Nothing is checked against the remote here; a bad reference fails at
 * checkout time.
 */
export function parseGitRef(version: string): GitRef {
  const v = version.trim();
  if (v.length === 0) {
    throw new InvalidToolchainVersionError(version);
  }

  for (const kind of ['commit', 'tag', 'branch'] as const) {
    const prefix = `${kind}:`;
    if (v.startsWith(prefix)) {
      return { kind, name: v.slice(prefix.length) };
    }
  }

  if (IDF_RELEASE.test(v)) {
    return { kind: 'tag', name: v.startsWith('v') ? v : `v${v}` };
  }
  return { kind: 'branch', name: v };
}

/** Directory-safe label for a git reference, e.g. `release-v5.1`. */
export function gitRefLabel(ref: GitRef): string {
  return ref.name.replace(/[^A-Za-z0-9._-]/g, '-');
}
