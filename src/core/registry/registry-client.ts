/**
 * Registry Client
 *
 * A registry answers two questions: which published version of a package
 * satisfies a selector, and what the archive of a given version is.
 *
 * HTTP protocol spoken by HttpRegistryClient:
 *   GET <url>/packages/<name>                      -> { name, versions: string[] }
 *   GET <url>/packages/<name>/<version>/archive    -> .tar.gz body
 */

import { Readable } from 'stream';

import type { RegistryConfig } from '../../types/index.js';
import { DownloadFailedError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { selectVersion, type VersionSelector } from '../manifest/selector.js';

export interface RegistryPackageInfo {
  name: string;
  version: string;
}

export interface RegistryDownload {
  /** File name suggested by the registry, used as the temp file suffix */
  filename: string;
  stream: Readable;
}

export interface RegistryClient {
  readonly name: string;
  readonly baseUrl: string;
  /** Highest version matching the selector, or null when there is none */
  findPackage(name: string, selector: VersionSelector): Promise<RegistryPackageInfo | null>;
  download(name: string, version: string): Promise<RegistryDownload>;
}

export type FetchFunction = typeof fetch;

export interface HttpRegistryClientOptions {
  fetch?: FetchFunction;
}

function encodePackageName(name: string): string {
  return name.split('/').map(encodeURIComponent).join('/');
}

function readVersions(body: unknown): string[] {
  if (typeof body !== 'object' || body === null || !('versions' in body)) {
    return [];
  }
  const { versions } = body;
  if (!Array.isArray(versions)) {
    return [];
  }
  return versions.filter((version): version is string => typeof version === 'string');
}

function filenameFromResponse(response: Response, fallback: string): string {
  const disposition = response.headers.get('content-disposition');
  const match = disposition ? /filename="?([^";]+)"?/i.exec(disposition) : null;
  return match?.[1] ?? fallback;
}

export class HttpRegistryClient implements RegistryClient {
  readonly name: string;
  readonly baseUrl: string;
  private readonly fetchFn: FetchFunction;

  constructor(config: RegistryConfig, options: HttpRegistryClientOptions = {}) {
    this.name = config.name;
    this.baseUrl = config.url.replace(/\/+$/, '');
    this.fetchFn = options.fetch ?? fetch;
  }

  private packageUrl(name: string): string {
    return `${this.baseUrl}/packages/${encodePackageName(name)}`;
  }

  async findPackage(name: string, selector: VersionSelector): Promise<RegistryPackageInfo | null> {
    const url = this.packageUrl(name);
    logger.debug(`Querying registry ${this.name}: ${url}`);

    let response: Response;
    try {
      response = await this.fetchFn(url, { headers: { accept: 'application/json' } });
    } catch (error) {
      throw new DownloadFailedError(url, error instanceof Error ? error.message : String(error));
    }

    if (response.status === 404) {
      return null;
    }
    if (!response.ok) {
      throw new DownloadFailedError(url, `registry responded ${response.status}`, response.status);
    }

    const body: unknown = await response.json();
    const version = selectVersion(readVersions(body), selector);
    return version === null ? null : { name, version };
  }

  async download(name: string, version: string): Promise<RegistryDownload> {
    const url = `${this.packageUrl(name)}/${encodeURIComponent(version)}/archive`;
    logger.debug(`Downloading ${url}`);

    let response: Response;
    try {
      response = await this.fetchFn(url);
    } catch (error) {
      throw new DownloadFailedError(url, error instanceof Error ? error.message : String(error));
    }

    if (!response.ok) {
      throw new DownloadFailedError(url, `registry responded ${response.status}`, response.status);
    }

    const fallback = `${name.replace(/^@/, '').replace(/\//g, '-')}-${version}.tar.gz`;
    return {
      filename: filenameFromResponse(response, fallback),
      stream: Readable.from([Buffer.from(await response.arrayBuffer())])
    };
  }
}

export function createRegistryClients(configs: RegistryConfig[], options: HttpRegistryClientOptions = {}): RegistryClient[] {
  return configs.map(config => new HttpRegistryClient(config, options));
}
