export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Raised by a host when a surface (or the process stream behind it) vanished
 * between lookup and use.
 */
export class SurfaceGoneError extends Error {
  constructor(readonly surfaceId: string) {
    super(`Surface ${surfaceId} is no longer available`);
    this.name = 'SurfaceGoneError';
  }
}
