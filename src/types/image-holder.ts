export interface ImageHolder {
  id: string | null;           // md5 of the full path
  source: string | null;       // full path on the mounted volume
  url: string | null;          // same as source, files are local
  mimetype: string | null;
  filename: string | null;     // display name (basename)
  cacheAllowed: boolean;       // always false for removable storage
  error: string | null;
}

export function createImageHolder(overrides?: Partial<ImageHolder>): ImageHolder {
  return {
    id: null,
    source: null,
    url: null,
    mimetype: null,
    filename: null,
    cacheAllowed: false,
    error: null,
    ...overrides,
  };
}

export function createErrorHolder(error: string): ImageHolder {
  return createImageHolder({ error });
}
