/**
 * Container image reference parsing
 *
 * Splits `[registry/]repository[:tag][@digest]` references and derives the
 * scanner version from the tag or digest component.
 *
 * @module utils/image-ref
 */

import { ConfigError } from '../config/errors';

/** A path component of a repository name */
const PATH_COMPONENT = /^[a-z0-9]+(?:(?:[._]|__|-+)[a-z0-9]+)*$/;

/** Registry host, with optional port */
const REGISTRY = /^(?:[a-zA-Z0-9](?:[a-zA-Z0-9-]*[a-zA-Z0-9])?)(?:\.[a-zA-Z0-9](?:[a-zA-Z0-9-]*[a-zA-Z0-9])?)*(?::[0-9]+)?$/;

const TAG = /^[\w][\w.-]{0,127}$/;

const DIGEST = /^[a-z0-9]+(?:[.+_-][a-z0-9]+)*:[a-fA-F0-9]{32,}$/;

/** Tag assumed when a reference names neither a tag nor a digest */
export const DEFAULT_TAG = 'latest';

/**
 * Error thrown when an image reference cannot yield a version.
 */
export class VersionError extends ConfigError {
  constructor(
    message: string,
    public readonly imageRef: string
  ) {
    super(message);
    this.name = 'VersionError';
  }
}

/**
 * Components of a parsed image reference.
 */
export interface ImageRef {
  /** Registry host (e.g., example.com:5000), when the reference names one */
  registry?: string;
  /** Repository path without registry */
  repository: string;
  tag?: string;
  digest?: string;
}

function looksLikeRegistry(component: string): boolean {
  return component.includes('.') || component.includes(':') || component === 'localhost';
}

/**
 * Parse an image reference into its components.
 *
 * @throws VersionError if the reference is malformed
 *
 * @example
 * parseImageRef('example.com/conftest:v1.2.3');
 * // { registry: 'example.com', repository: 'conftest', tag: 'v1.2.3' }
 */
export function parseImageRef(imageRef: string): ImageRef {
  const trimmed = imageRef.trim();
  if (!trimmed) {
    throw new VersionError('Image reference is empty', imageRef);
  }

  let remainder = trimmed;
  let digest: string | undefined;

  const at = remainder.indexOf('@');
  if (at !== -1) {
    digest = remainder.slice(at + 1);
    remainder = remainder.slice(0, at);
    if (!DIGEST.test(digest)) {
      throw new VersionError(`Invalid digest '${digest}' in image reference '${imageRef}'`, imageRef);
    }
  }

  // The tag separator is the last colon after the last slash; earlier colons
  // belong to a registry port.
  let tag: string | undefined;
  const lastSlash = remainder.lastIndexOf('/');
  const lastColon = remainder.lastIndexOf(':');
  if (lastColon > lastSlash) {
    tag = remainder.slice(lastColon + 1);
    remainder = remainder.slice(0, lastColon);
    if (!TAG.test(tag)) {
      throw new VersionError(`Invalid tag '${tag}' in image reference '${imageRef}'`, imageRef);
    }
  }

  const components = remainder.split('/');
  let registry: string | undefined;
  if (components.length > 1 && looksLikeRegistry(components[0])) {
    registry = components.shift();
    if (registry === undefined || !REGISTRY.test(registry)) {
      throw new VersionError(`Invalid registry in image reference '${imageRef}'`, imageRef);
    }
  }

  if (components.length === 0 || !components.every((c) => PATH_COMPONENT.test(c))) {
    throw new VersionError(`Invalid repository in image reference '${imageRef}'`, imageRef);
  }

  return {
    registry,
    repository: components.join('/'),
    tag,
    digest,
  };
}

/**
 * Derive a scanner version from an image reference.
 * The digest wins over the tag; a bare repository means `latest`.
 *
 * @throws VersionError if the reference is malformed
 */
export function getVersionFromImageRef(imageRef: string): string {
  const { tag, digest } = parseImageRef(imageRef);
  return digest ?? tag ?? DEFAULT_TAG;
}
