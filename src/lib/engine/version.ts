// Kept in step with package.json
export const VERSION = '0.4.0';

export const DEFAULT_API_VERSION = 'v5.0.0';
