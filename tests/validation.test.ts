import { describe, expect, it } from 'vitest';

import { InvalidRequestError } from '../src/errors.js';
import { determineContentType } from '../src/upload.js';
import { isValidUrl, validateUrl } from '../src/validation.js';

describe('validateUrl', () => {
  it.each([
    'https://www.example.com',
    'http://www.example.com',
    'https://www.example.com/path/to/content',
    'https://www.example.com/video?id=123&t=456',
    'https://www.example.com/page#section',
    'https://subdomain.example.com',
    'https://www.youtube.com/watch?v=abc123',
    'https://www.tiktok.com/@someone/video/123456789',
    'https://news.example.xn--p1ai/story',
    'https://пример.рф/видео',
  ])('accepts %s', (url) => {
    expect(validateUrl(url).hostname).toBe(new URL(url).hostname);
    expect(isValidUrl(url)).toBe(true);
  });

  it.each([
    ['', 'Invalid URL: '],
    ['www.example.com', 'Invalid URL: www.example.com'],
    ['https://', 'Invalid URL: https://'],
    ['ftp://example.com', 'URL must use http or https scheme'],
    ['file:///path/to/file', 'URL must use http or https scheme'],
    ['https://192.168.1.1', 'URL must have a valid domain'],
    ['https://[::1]', 'URL must have a valid domain'],
    ['http://localhost:8080', 'URL must have a valid domain'],
  ])('rejects %s', (url, message) => {
    expect(() => validateUrl(url)).toThrow(InvalidRequestError);
    expect(() => validateUrl(url)).toThrow(message);
    expect(isValidUrl(url)).toBe(false);
  });
});

describe('determineContentType', () => {
  it.each([
    ['image.jpg', 'image/jpeg'],
    ['photo.JPEG', 'image/jpeg'],
    ['/home/user/photos/vacation.png', 'image/png'],
    ['animation.gif', 'image/gif'],
    ['./assets/video.mp4', 'video/mp4'],
    ['movie.mov', 'video/quicktime'],
    ['clip.avi', 'video/x-msvideo'],
    ['web_video.webm', 'video/webm'],
    ['backup.file.jpg', 'image/jpeg'],
    ['archive.tar.gz', 'application/octet-stream'],
    ['filename_without_extension', 'application/octet-stream'],
  ])('maps %s to %s', (filePath, contentType) => {
    expect(determineContentType(filePath)).toBe(contentType);
  });
});
