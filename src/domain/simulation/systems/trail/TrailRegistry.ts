import trailData from "../../../data/trails.json";
import { Location } from "./Location";
import { Trail } from "./Trail";
import { LocationKind } from "../../../../shared/constants/TrailEnums";
import { GameMode } from "../../../../shared/constants/ModeEnums";

export interface LocationDefinition {
  name: string;
  kind?: string;
  mode?: string;
  skipChoices?: LocationDefinition[];
}

export interface TrailDefinition {
  name: string;
  trailLength: number;
  locations: LocationDefinition[];
}

const TRAILS: Record<string, TrailDefinition> = trailData;

function parseKind(value: string | undefined, owner: string): LocationKind {
  if (value === undefined) return LocationKind.LANDMARK;
  const kind = Object.values(LocationKind).find((k) => k === value);
  if (!kind) {
    throw new Error(`Unknown location kind "${value}" for ${owner}`);
  }
  return kind;
}

function parseMode(value: string | undefined, owner: string): GameMode {
  if (value === undefined) return GameMode.TRAVEL;
  const mode = Object.values(GameMode).find((m) => m === value);
  if (!mode) {
    throw new Error(`Unknown game mode "${value}" for ${owner}`);
  }
  return mode;
}

function buildLocation(definition: LocationDefinition): Location {
  return new Location(definition.name, {
    kind: parseKind(definition.kind, definition.name),
    mode: parseMode(definition.mode, definition.name),
    skipChoices: (definition.skipChoices ?? []).map(buildLocation),
  });
}

/**
 * Builds trails from the bundled trail data. Every call returns fresh
 * Location instances so a new game never sees statuses from an old one.
 */
export class TrailRegistry {
  public static ids(): string[] {
    return Object.keys(TRAILS);
  }

  public static create(id: string): Trail {
    const definition = TRAILS[id];
    if (!definition) {
      throw new Error(
        `Unknown trail "${id}", expected one of: ${TrailRegistry.ids().join(", ")}`,
      );
    }
    return TrailRegistry.fromDefinition(id, definition);
  }

  public static fromDefinition(id: string, definition: TrailDefinition): Trail {
    return new Trail(
      id,
      definition.name,
      definition.locations.map(buildLocation),
      definition.trailLength,
    );
  }
}
