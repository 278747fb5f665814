/**
 * The minimum a loaded plugin exposes to the host. Extension points extend it
 * with the accessor they collect descriptors through.
 */
export interface Plugin {
  /** The plugin's UUID; descriptors it provides carry it as `ownerId`. */
  readonly id: string;
  readonly name?: string;
}

/**
 * Which way the resolved order is consumed.
 * - `forward`: as resolved (registration, startup).
 * - `reverse`: last first (teardown, unregistration).
 */
export type Direction = "forward" | "reverse";
