export const DEFAULT_HOST = '127.0.0.1';
export const DEFAULT_PORT = 7497; // TWS ペーパートレード
export const DEFAULT_CLIENT_ID = 0;
