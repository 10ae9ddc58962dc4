export const VERSION = '0.1.0';

/** First line every descriptor must carry. */
export const SBUILD_MARKER = '#!/SBUILD';

export const VALID_PKG_TYPES = [
  'appbundle',
  'appimage',
  'archive',
  'dynamic',
  'flatimage',
  'gameimage',
  'nixappimage',
  'runimage',
  'static',
] as const;
