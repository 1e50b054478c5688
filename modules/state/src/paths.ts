import path from 'node:path';

export function sanitizeForPath(name: string, fallback = 'unknown'): string {
  const text = String(name || '').trim();
  if (!text) return fallback;
  const cleaned = text.replace(/[\\/:"*?<>|]+/g, '_').replace(/^\.+/, '_').trim();
  return cleaned || fallback;
}

/**
 * Reversible file name for a target id: distinct ids never share a file.
 * Percent-encodes everything outside [A-Za-z0-9._~-], plus a leading dot.
 */
export function encodeTargetFileName(targetId: string): string {
  const encoded = encodeURIComponent(targetId).replace(
    /[!'()*]/g,
    (ch) => `%${ch.charCodeAt(0).toString(16).toUpperCase()}`,
  );
  return encoded.startsWith('.') ? `%2E${encoded.slice(1)}` : encoded;
}

export function resolveTargetArtifactPath(input: {
  outputDir: string;
  targetId: string;
  group?: string | null;
}): string {
  const targetId = String(input.targetId || '');
  if (!targetId.trim()) throw new Error('targetId must not be empty');
  const base = path.join(input.outputDir, 'targets');
  const group = String(input.group || '').trim();
  const dir = group ? path.join(base, sanitizeForPath(group)) : base;
  return path.join(dir, `${encodeTargetFileName(targetId)}.json`);
}
