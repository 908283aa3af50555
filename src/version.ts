export const APP_NAME = 'miqat';

/** Kept in step with package.json */
export const APP_VERSION = '0.3.0';
