/**
 * Shared constants for the modpm CLI application
 * Single source of truth for directory names, file names and built-in patterns.
 */

export const DIR_PATTERNS = {
  MODPM_HOME: '.modpm',
  MODULES: 'modpm_modules',
  BIN: '.bin',
  PIP: '.pip'
} as const;

export const FILE_PATTERNS = {
  MANIFEST: 'modpm.yml',
  PACKAGE_LINK: '.modpm-link',
  INSTALLED_FILES: 'installed-files.txt',
  IGNORE_FILE: '.modpmignore'
} as const;

export const MODPM_HOME_DIRS = {
  MODULES: 'modules',
  BIN: 'bin',
  PIP: 'pip'
} as const;

/**
 * Files never copied into an install directory, on top of the manifest's own
 * `dist.exclude` list.
 */
export const DEFAULT_EXCLUDE_PATTERNS: readonly string[] = [
  '.DS_Store',
  '.svn/*',
  '.git*',
  `${DIR_PATTERNS.MODULES}/*`,
  '*.pyc',
  '*.pyo',
  '__pycache__/*',
  'dist/*',
  FILE_PATTERNS.INSTALLED_FILES,
  FILE_PATTERNS.PACKAGE_LINK
];

/** Placeholder in a `bin` entry name that expands to the interpreter version. */
export const PY_VERSION_PLACEHOLDER = '${py}';

export const ARCHIVE_EXTENSIONS = ['.tar', '.tar.gz', '.tgz'] as const;

export const LIFECYCLE_HOOKS = {
  PRE_INSTALL: 'pre-install',
  POST_INSTALL: 'post-install',
  PRE_UNINSTALL: 'pre-uninstall'
} as const;

export const DEFAULT_REGISTRY = {
  name: 'default',
  url: 'https://registry.modpm.org'
} as const;

export type LifecycleHook = typeof LIFECYCLE_HOOKS[keyof typeof LIFECYCLE_HOOKS];
