export const VERSION = "0.1.0";

export const versionMessage = (): string => `nstack ${VERSION}`;
