export const CITENET_VERSION = '0.1.0';
