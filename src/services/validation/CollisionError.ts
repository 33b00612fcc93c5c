/**
 * CollisionError - free-form settings shadow structured options
 *
 * Carries every colliding key together with the option path the user
 * should set instead.
 */

export interface Collision {
  /** Settings key supplied by the user, e.g. "graphical" */
  key: string;
  /** Structured option path that owns this key, e.g. "useGraphicalBrowser" */
  replacement: string;
}

export class CollisionError extends Error {
  constructor(public readonly collisions: readonly Collision[]) {
    super(CollisionError.formatCollisions(collisions));
    this.name = 'CollisionError';
  }

  get keys(): string[] {
    return this.collisions.map(c => c.key);
  }

  static formatResolution(collision: Collision): string {
    return `replace settings.${collision.key} with config.${collision.replacement}`;
  }

  static formatCollisions(collisions: readonly Collision[]): string {
    return (
      'Some surfraw settings conflict with surfraw config options.\n' +
      'To resolve these conflicts, you should:\n' +
      collisions.map(c => CollisionError.formatResolution(c)).join('\n')
    );
  }
}
