/**
 * Near-Earth objects and their close approaches
 *
 * A Neo owns its approaches; an Approach holds a non-owning reference back to
 * its Neo, set once by the linker. Both are built once during ingestion and
 * never outlive the collections that hold them.
 */

import {
  formatTimestamp,
  normalizeText,
  parseApproachTime,
  parseDiameter,
  parseHazardous,
  parseMeasurement,
} from "./normalize.js";
import { AlreadyLinkedError } from "./errors.js";
import type { ApproachRecord, NeoRecord } from "./types.js";

/**
 * Flat NEO fields for row-oriented output
 */
export type NeoRow = [designation: string, name: string, diameter: number, hazardous: boolean];

/**
 * Keyed NEO fields for structured output
 */
export interface NeoJson {
  designation: string;
  name: string;
  diameter_km: number;
  potentially_hazardous: boolean;
}

export type ApproachRow = [
  datetime: string,
  distance: number,
  velocity: number,
  ...neo: NeoRow,
];

export interface ApproachJson {
  datetime_utc: string;
  distance_au: number;
  velocity_km_s: number;
  neo: NeoJson;
}

// Approach → owning Neo; written only by Neo#attach
const owners = new WeakMap<Approach, Neo>();

export class Neo {
  readonly designation: string | undefined;
  readonly name: string | undefined;
  readonly diameter: number;
  readonly hazardous: boolean;
  readonly #approaches: Approach[] = [];

  constructor(record: NeoRecord = {}) {
    this.designation = normalizeText(record.designation);
    this.name = normalizeText(record.name);
    this.diameter = parseDiameter(record.diameter);
    this.hazardous = parseHazardous(record.hazardous);
  }

  /** Linked approaches, in input order */
  get approaches(): readonly Approach[] {
    return this.#approaches;
  }

  get fullName(): string {
    const designation = this.designation ?? "";
    return this.name === undefined ? designation : `${designation} (${this.name})`;
  }

  /**
   * Link an approach to this NEO
   * @internal used by the linker only
   * @throws AlreadyLinkedError when the approach already belongs to a NEO
   */
  attach(approach: Approach): void {
    const owner = owners.get(approach);
    if (owner !== undefined) {
      throw new AlreadyLinkedError(approach.designation, owner.designation);
    }
    owners.set(approach, this);
    this.#approaches.push(approach);
  }

  toRow(): NeoRow {
    return [this.designation ?? "", this.name ?? "", this.diameter, this.hazardous];
  }

  toRecord(): NeoJson {
    return {
      designation: this.designation ?? "",
      name: this.name ?? "",
      diameter_km: this.diameter,
      potentially_hazardous: this.hazardous,
    };
  }

  toString(): string {
    const size = Number.isNaN(this.diameter)
      ? "an unknown diameter"
      : `a diameter of ${this.diameter.toFixed(3)} km`;
    const hazard = this.hazardous ? "is" : "is not";
    return `NEO ${this.fullName} has ${size} and ${hazard} potentially hazardous.`;
  }
}

export class Approach {
  readonly designation: string | undefined;
  readonly time: Date;
  readonly distance: number;
  readonly velocity: number;

  constructor(record: ApproachRecord = {}) {
    this.designation = normalizeText(record.designation);
    this.time = parseApproachTime(record.time);
    this.distance = parseMeasurement(record.distance);
    this.velocity = parseMeasurement(record.velocity);
  }

  /** Linked NEO; set once by Neo#attach */
  get neo(): Neo | undefined {
    return owners.get(this);
  }

  get timeString(): string {
    return formatTimestamp(this.time);
  }

  // Unlinked approaches serialize against a placeholder built from the raw key
  #neoOrPlaceholder(): Neo {
    return this.neo ?? new Neo({ designation: this.designation });
  }

  toRow(): ApproachRow {
    return [this.timeString, this.distance, this.velocity, ...this.#neoOrPlaceholder().toRow()];
  }

  toRecord(): ApproachJson {
    return {
      datetime_utc: this.timeString,
      distance_au: this.distance,
      velocity_km_s: this.velocity,
      neo: this.#neoOrPlaceholder().toRecord(),
    };
  }

  toString(): string {
    const who = this.neo?.fullName ?? this.designation ?? "unknown";
    return (
      `On ${this.timeString}, '${who}' approaches Earth at a distance of ` +
      `${this.distance.toFixed(2)} au and a velocity of ${this.velocity.toFixed(2)} km/s.`
    );
  }
}
