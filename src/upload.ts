import { readFile, stat } from 'node:fs/promises';
import path from 'node:path';

import { InvalidFileError, UploadFailedError, describeError } from './errors.js';
import { apiPaths, type Transport } from './http.js';
import { parseWith, signedUrlResponseSchema, socialMediaResponseSchema } from './schema.js';
import type { UploadDescriptor, UploadHandle } from './types.js';
import { validateUrl } from './validation.js';

const contentTypes: Record<string, string> = {
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.gif': 'image/gif',
  '.mp4': 'video/mp4',
  '.mov': 'video/quicktime',
  '.avi': 'video/x-msvideo',
  '.webm': 'video/webm',
};

export function determineContentType(filePath: string): string {
  const extension = path.extname(filePath).toLowerCase();
  return contentTypes[extension] ?? 'application/octet-stream';
}

export async function readUploadFile(filePath: string): Promise<Buffer> {
  try {
    const stats = await stat(filePath);
    if (!stats.isFile()) {
      throw new InvalidFileError(`Not a regular file: ${filePath}`);
    }
  } catch (error) {
    if (error instanceof InvalidFileError) {
      throw error;
    }
    throw new InvalidFileError(`File not found: ${filePath}`, error);
  }

  let content: Buffer;
  try {
    content = await readFile(filePath);
  } catch (error) {
    throw new InvalidFileError(`Unable to read file ${filePath}: ${describeError(error)}`, error);
  }

  if (content.length === 0) {
    throw new InvalidFileError(`File is empty: ${filePath}`);
  }
  return content;
}

/**
 * Presigned upload: ask the API for a signed URL keyed by file name, then PUT
 * the bytes straight to storage.
 */
export async function uploadFile(transport: Transport, filePath: string, signal?: AbortSignal): Promise<UploadHandle> {
  const content = await readUploadFile(filePath);

  const json = await transport.post(apiPaths.signedUrl, { fileName: path.basename(filePath) }, signal);
  const signed = parseWith(signedUrlResponseSchema, json, 'signed URL');

  await transport.put(signed.response.signedUrl, content, determineContentType(filePath), signal);

  return {
    requestId: signed.requestId,
    mediaId: signed.mediaId,
  };
}

export async function uploadSocialMedia(
  transport: Transport,
  socialLink: string,
  signal?: AbortSignal,
): Promise<UploadHandle> {
  validateUrl(socialLink);

  const json = await transport.post(apiPaths.socialMedia, { socialLink }, signal);
  const parsed = parseWith(socialMediaResponseSchema, json, 'social media upload');
  if (!parsed.requestId) {
    throw new UploadFailedError(`Social media upload returned no request id: ${parsed.response ?? '<empty>'}`);
  }

  return { requestId: parsed.requestId };
}

export function uploadDescriptor(
  transport: Transport,
  input: UploadDescriptor,
  signal?: AbortSignal,
): Promise<UploadHandle> {
  if (typeof input === 'string') {
    return uploadFile(transport, input, signal);
  }
  if ('socialLink' in input) {
    return uploadSocialMedia(transport, input.socialLink, signal);
  }
  return uploadFile(transport, input.filePath, signal);
}

export function describeUpload(input: UploadDescriptor): string {
  if (typeof input === 'string') {
    return input;
  }
  return 'socialLink' in input ? input.socialLink : input.filePath;
}
