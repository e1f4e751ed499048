import { describe, expect, it } from 'vitest';
import { PRIVATE_TARGET_MESSAGE, TargetUrlError, resolveAuditTarget } from './request-guard';

const publicHost = async () => ['203.0.113.10'];

describe('resolveAuditTarget', () => {
  it('adds https:// to bare hosts', async () => {
    await expect(resolveAuditTarget(' example.com ', publicHost)).resolves.toBe('https://example.com/');
  });

  it('keeps host and port when no scheme is given', async () => {
    await expect(resolveAuditTarget('example.com:8080/page', publicHost)).resolves.toBe('https://example.com:8080/page');
  });

  it('rejects other schemes', async () => {
    await expect(resolveAuditTarget('ftp://example.com', publicHost)).rejects.toThrow('Only HTTP(S) URLs are supported');
  });

  it('rejects unparsable input', async () => {
    await expect(resolveAuditTarget('http://', publicHost)).rejects.toThrow('Please enter a valid URL');
  });

  it('rejects private targets with a TargetUrlError', async () => {
    const attempt = resolveAuditTarget('http://[::ffff:127.0.0.1]/', publicHost);
    await expect(attempt).rejects.toBeInstanceOf(TargetUrlError);
    await expect(attempt).rejects.toThrow(PRIVATE_TARGET_MESSAGE);
  });
});
