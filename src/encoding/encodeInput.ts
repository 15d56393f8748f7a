/** Turns file contents into a value the API accepts in place of the file, e.g. a URL. */
export type FileUploader = (data: Uint8Array, contentType: string) => Promise<string>;

const DEFAULT_CONTENT_TYPE = 'application/octet-stream';

export const toDataUri: FileUploader = async (data, contentType) => {
  const base64 = Buffer.from(data.buffer, data.byteOffset, data.byteLength).toString('base64');
  return `data:${contentType};base64,${base64}`;
};

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Prepares prediction input for sending: binary values (Uint8Array, Buffer,
 * Blob) nested anywhere in arrays or plain objects are replaced by what
 * `upload` returns. Everything else is passed through as is.
 */
export async function encodeInput(value: unknown, upload: FileUploader = toDataUri): Promise<unknown> {
  if (value instanceof Uint8Array) {
    return upload(value, DEFAULT_CONTENT_TYPE);
  }
  if (value instanceof Blob) {
    const bytes = new Uint8Array(await value.arrayBuffer());
    return upload(bytes, value.type || DEFAULT_CONTENT_TYPE);
  }
  if (Array.isArray(value)) {
    return Promise.all(value.map(item => encodeInput(item, upload)));
  }
  if (isPlainObject(value)) {
    const entries = await Promise.all(
      Object.entries(value).map(async ([key, item]) => [key, await encodeInput(item, upload)] as const),
    );
    return Object.fromEntries(entries);
  }
  return value;
}
