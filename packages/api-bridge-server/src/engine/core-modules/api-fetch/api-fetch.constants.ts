export const INLINE_PREVIEW_MAX_LENGTH = 1000;

export const AUTO_SESSION_TIMESTAMP_FORMAT = 'yyyyMMdd_HHmmss';
