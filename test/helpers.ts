/** Little-endian byte builders for test buffers. */

export function f32(...values: number[]): Uint8Array {
  const out = new Uint8Array(values.length * 4);
  const view = new DataView(out.buffer);
  values.forEach((v, i) => view.setFloat32(i * 4, v, true));
  return out;
}

export function u32(...values: number[]): Uint8Array {
  const out = new Uint8Array(values.length * 4);
  const view = new DataView(out.buffer);
  values.forEach((v, i) => view.setUint32(i * 4, v, true));
  return out;
}

export function concat(...parts: Uint8Array[]): Uint8Array {
  const out = new Uint8Array(parts.reduce((n, p) => n + p.byteLength, 0));
  let at = 0;
  for (const p of parts) {
    out.set(p, at);
    at += p.byteLength;
  }
  return out;
}

export type LogCall = { level: 'debug' | 'info' | 'warn'; obj: object; msg?: string };

export function recordingLogger(): { calls: LogCall[]; debug: (obj: object, msg?: string) => void; info: (obj: object, msg?: string) => void; warn: (obj: object, msg?: string) => void } {
  const calls: LogCall[] = [];
  return {
    calls,
    debug: (obj, msg) => calls.push({ level: 'debug', obj, msg }),
    info: (obj, msg) => calls.push({ level: 'info', obj, msg }),
    warn: (obj, msg) => calls.push({ level: 'warn', obj, msg }),
  };
}
