export const SDK_VERSION = '0.1.0';

export const USER_AGENT = `gagiteck-typescript/${SDK_VERSION}`;
