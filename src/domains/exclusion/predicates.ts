import type { HostInfo, PlatformPredicate } from './types.ts';

const GOOS: Readonly<Record<string, string>> = {
  win32: 'windows',
  sunos: 'solaris',
};

const GOARCH: Readonly<Record<string, string>> = {
  x64: 'amd64',
  ia32: '386',
  x32: '386',
  ppc64: 'ppc64le',
};

const FALSE_FLAGS: ReadonlySet<string> = new Set(['', '0', 'false']);

const isSet = (value: string | undefined): boolean =>
  value !== undefined && !FALSE_FLAGS.has(value.trim().toLowerCase());

export interface HostFacts {
  readonly platform: string;
  readonly arch: string;
  readonly env: Readonly<Record<string, string | undefined>>;
}

/**
 * GOOS/GOARCH from the environment win over the running platform
 */
export const detectHost = (facts: HostFacts): HostInfo => ({
  os: facts.env.GOOS || GOOS[facts.platform] || facts.platform,
  arch: facts.env.GOARCH || GOARCH[facts.arch] || facts.arch,
  ci: isSet(facts.env.CI) || isSet(facts.env.BUILD_NUMBER),
});

export const matchesHost = (predicate: PlatformPredicate | undefined, host: HostInfo): boolean => {
  if (!predicate) {
    return true;
  }
  if (predicate.os && !predicate.os.includes(host.os)) {
    return false;
  }
  if (predicate.arch && !predicate.arch.includes(host.arch)) {
    return false;
  }
  if (predicate.ci !== undefined && predicate.ci !== host.ci) {
    return false;
  }
  return true;
};
