import { markerName, type NamingOptions } from "./hash.js";

/**
 * Marker classes anchor contextual selectors (see `when`). They are applied to
 * the observed element and never carry styles themselves.
 */

export class Marker {
  readonly class: string;

  constructor(className: string) {
    this.class = className;
  }

  equals(other: Marker): boolean {
    return this.class === other.class;
  }

  toString(): string {
    return this.class;
  }
}

export function defaultMarker(options: NamingOptions): Marker {
  return new Marker(`${options.classNamePrefix}-default-marker`);
}

/** A marker unique to `name`; the same name always gives the same class. */
export function defineMarker(name: string, options: NamingOptions): Marker {
  return new Marker(markerName(name, options));
}

export function isMarker(value: unknown): value is Marker {
  return value instanceof Marker;
}
