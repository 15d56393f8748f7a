import { InvalidArgumentError } from '../errors/argument.js';

export const MODELS_PATH = '/v1/models';

export interface ModelKey {
  owner: string;
  name: string;
}

export function parseModelKey(key: string): ModelKey {
  const parts = key.split('/');
  const [owner, name] = parts;
  if (parts.length !== 2 || !owner || !name) {
    throw new InvalidArgumentError(`Invalid model key "${key}": expected "owner/name"`);
  }
  return { owner, name };
}

export function modelPath({ owner, name }: ModelKey): string {
  return `${MODELS_PATH}/${encodeURIComponent(owner)}/${encodeURIComponent(name)}`;
}
