/**
 * Torrent descriptors
 *
 * Recognising `.torrent` and `.magnet` files and turning them into
 * something the cloud store accepts.
 */

import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { ValidationError, type DescriptorKind, type TorrentDescriptor } from '@seedsync/core';
import type { Submission } from '@seedsync/cloud';
import { getBasename, getExtension } from '@seedsync/utils';

export const DESCRIPTOR_EXTENSIONS: Record<string, DescriptorKind> = {
  '.torrent': 'torrent',
  '.magnet': 'magnet',
};

export function descriptorKind(fileName: string): DescriptorKind | null {
  return DESCRIPTOR_EXTENSIONS[getExtension(fileName)] ?? null;
}

/**
 * Describe a file; null when it is not a torrent or magnet file
 */
export function describeFile(path: string, discoveredAt: Date = new Date()): TorrentDescriptor | null {
  const name = basename(path);
  const kind = descriptorKind(name);
  if (!kind) {
    return null;
  }
  return { path, title: getBasename(name), kind, discoveredAt };
}

/**
 * First non-empty line of a magnet file, which must be a magnet URI
 */
export function parseMagnetFile(content: string): string {
  const line = content
    .split(/\r?\n/)
    .map((candidate) => candidate.trim())
    .find((candidate) => candidate.length > 0);

  if (!line || !line.startsWith('magnet:?')) {
    throw new ValidationError('magnet', 'file does not contain a magnet:? URI');
  }
  return line;
}

/**
 * Read a descriptor's file into a cloud submission
 */
export async function readSubmission(descriptor: TorrentDescriptor): Promise<Submission> {
  if (descriptor.kind === 'magnet') {
    return { kind: 'magnet', uri: parseMagnetFile(await readFile(descriptor.path, 'utf8')) };
  }

  const content = await readFile(descriptor.path);
  if (content.length === 0) {
    throw new ValidationError('torrent', 'file is empty');
  }
  return { kind: 'torrent', fileName: basename(descriptor.path), content };
}
