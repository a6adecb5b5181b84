import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { dirname, join } from 'path';

export const REQUESTS_METADATA = [
  'Metadata-Version: 2.1',
  'Name: requests',
  'Version: 2.25.1',
  'Summary: Python HTTP for Humans.',
  'License: Apache 2.0',
  'Classifier: Programming Language :: Python :: 3',
  'Classifier: License :: OSI Approved :: Apache Software License',
  'Platform: UNKNOWN',
  'Description-Content-Type: text/markdown',
  '',
  '# Requests',
  'Version: 9.9.9',
  ''
].join('\n');

export const REQUESTS_INIT = [
  '# -*- coding: utf-8 -*-',
  '',
  '"""Requests HTTP library.',
  '',
  '    Sends requests.',
  '"""',
  '',
  "__version__ = '2.25.1'",
  ''
].join('\n');

export const SIX_SOURCE = '"""Utilities for writing code that runs on Python 2 and 3"""\n\nPY3 = True\n';

/**
 * Files of a small two-runtime installation, relative to the runtime root.
 */
const FILES: Record<string, string> = {
  '3.11/lib/python3.11/site-packages/requests-2.24.0.dist-info/METADATA':
    'Metadata-Version: 2.1\nName: requests\nVersion: 2.24.0\nLicense: Apache 2.0\n\nlong description\n',
  '3.11/lib/python3.11/site-packages/six.py': SIX_SOURCE,

  '3.12/lib/python3.12/site-packages/requests-2.25.1.dist-info/METADATA': REQUESTS_METADATA,
  '3.12/lib/python3.12/site-packages/requests-2.25.1.dist-info/LICENSE': 'Apache License 2.0 text\n',
  '3.12/lib/python3.12/site-packages/requests-2.25.1.dist-info/top_level.txt': 'requests\n',
  '3.12/lib/python3.12/site-packages/requests/__init__.py': REQUESTS_INIT,
  '3.12/lib/python3.12/site-packages/six.py': SIX_SOURCE,
  '3.12/lib/python3.12/site-packages/six-1.16.0.dist-info/METADATA': 'Name: six\nVersion: 1.16.0\n',
  '3.12/lib/python3.12/site-packages/pyobjc-9.0.dist-info/METADATA': 'Name: pyobjc\nVersion: 9.0\n',
  '3.12/lib/python3.12/site-packages/Flask_Login-0.6.3.dist-info/RECORD': 'flask_login/__init__.py,,\n',
  '3.12/lib/python3.12/site-packages/legacy-unknown.dist-info/METADATA': 'Name: legacy\nVersion: 1.4rc1\n',
  '3.12/lib/python3.12/site-packages/README.txt': 'not a package\n',

  // Same label as 3.12, sorts after it
  '3.12-old/lib/python3.12/site-packages/old-1.0.dist-info/METADATA': 'Name: old\n',
  'notes/readme.txt': 'no version in this name\n'
};

export interface FakeEnvironment {
  readonly root: string;
  path(...parts: string[]): string;
  siteDir(label: string): string;
  cleanup(): Promise<void>;
}

export async function createFakeEnvironment(): Promise<FakeEnvironment> {
  const root = await mkdtemp(join(tmpdir(), 'pkgsight-env-'));
  for (const [relative, content] of Object.entries(FILES)) {
    const target = join(root, relative);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, content, 'utf8');
  }

  return {
    root,
    path: (...parts: string[]) => join(root, ...parts),
    siteDir: (label: string) => join(root, label, 'lib', `python${label}`, 'site-packages'),
    cleanup: () => rm(root, { recursive: true, force: true })
  };
}
