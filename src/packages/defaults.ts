export const DEFAULT_DPKG_ADMIN_DIR = '/var/lib/dpkg';
export const DEFAULT_DU_BIN_PATH = '/usr/bin/du';

// Top-level /var subtrees whose per-package entries are measured with du.
export const VAR_SUBTREES = ['lib', 'cache', 'log'] as const;

export function envOverride(name: string): string | undefined {
  const value = process.env[name]?.trim();
  return value ? value : undefined;
}

export function resolveDpkgAdminDir(): string {
  return envOverride('PKG_BLAME_DPKG_ADMIN_DIR') ?? DEFAULT_DPKG_ADMIN_DIR;
}

// Node's process.arch to the Debian architecture name.
const DEBIAN_ARCHITECTURES: Record<string, string> = {
  x64: 'amd64',
  ia32: 'i386',
  arm64: 'arm64',
  arm: 'armhf',
  ppc64: 'ppc64el',
  riscv64: 'riscv64',
  s390x: 's390x',
  loong64: 'loong64',
};

export function resolveNativeArch(): string {
  return envOverride('PKG_BLAME_DPKG_ARCH') ?? DEBIAN_ARCHITECTURES[process.arch] ?? process.arch;
}

export function resolveDuBinPath(): string {
  return envOverride('PKG_BLAME_DU_PATH') ?? DEFAULT_DU_BIN_PATH;
}
