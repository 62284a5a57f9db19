import type { GeneratorContext } from "../config.js";
import { COLUMN_ALIASES, aliasedText, cellInteger, cellText } from "../pools.js";
import type { InputRecord } from "../io.js";
import { randomUuid, stableUuid, type Random } from "../random.js";
import type { RoomRow, TableLayout } from "../types.js";
import { checkCounts, throwIfInvalid, type ValidationError } from "../validate.js";
import { VOCABULARY } from "../vocabulary.js";

export const ROOM_LAYOUT: TableLayout<RoomRow> = {
  entity: "rooms",
  defaultFile: "rooms.csv",
  columns: ["name", "building", "capacity"],
};

type RoomType = "lecture" | "lab" | "seminar" | "studio" | "room";

// Repeats weight the draw toward lecture halls and labs.
const ROOM_TYPES: readonly RoomType[] = [
  "lecture", "lecture", "lecture",
  "lab", "lab", "lab",
  "seminar", "seminar",
  "studio", "room", "room",
];

const CAPACITY_RANGES: Record<RoomType, [number, number]> = {
  lecture: [80, 300],
  lab: [12, 30],
  seminar: [10, 24],
  studio: [15, 35],
  room: [18, 45],
};

const NAME_TRIES = 20;

export interface RoomOptions {
  count: number;
}

/** A room as sessions see it: a derived id and, when known, its capacity. */
export interface RoomRef {
  roomId: string;
  capacity?: number;
}

function roomName(random: Random, type: RoomType): string {
  const letters = VOCABULARY.rooms.letters;
  switch (type) {
    case "lecture":
      return `Lecture Hall ${random.int(1, 300)}`;
    case "lab":
      return `Lab ${random.int(1, 80)}${random.pick(["", random.pick(letters)])}`;
    case "seminar":
      return `Seminar ${random.int(100, 599)}`;
    case "studio":
      return `Studio ${random.pick(letters)}-${random.int(1, 20)}`;
    case "room": {
      const floor = random.int(1, 6);
      const num = random.int(1, 35);
      return `${floor}-${String(num).padStart(2, "0")}`;
    }
  }
}

function capacityFor(random: Random, type: RoomType): number {
  const [min, max] = CAPACITY_RANGES[type];
  return random.int(min, max);
}

/** Stable id for a room, so sessions and enrollments join across runs. */
export function roomIdFor(building: string, name: string): string {
  return stableUuid(building, name);
}

export function generateRooms(ctx: GeneratorContext, options: RoomOptions): RoomRow[] {
  const errors: ValidationError[] = [];
  checkCounts({ count: options.count }, errors);
  throwIfInvalid(errors);

  const { random } = ctx;
  const rows: RoomRow[] = [];
  const seen = new Set<string>();

  for (let i = 0; i < options.count; i++) {
    const building = random.pick(VOCABULARY.rooms.buildings);
    let row: RoomRow | undefined;
    for (let t = 0; t < NAME_TRIES && !row; t++) {
      const type = random.pick(ROOM_TYPES);
      const name = roomName(random, type);
      if (!seen.has(`${building}::${name}`)) {
        row = { name, building, capacity: capacityFor(random, type) };
      }
    }
    if (!row) {
      const type = random.pick(ROOM_TYPES);
      const base = roomName(random, type);
      let name = `${base}-${random.int(1000, 9999)}`;
      while (seen.has(`${building}::${name}`)) name = `${base}-${random.int(1000, 9999)}`;
      row = { name, building, capacity: capacityFor(random, type) };
    }
    seen.add(`${row.building}::${row.name}`);
    rows.push(row);
  }
  return rows;
}

export function roomRefFromRow(row: RoomRow): RoomRef {
  return { roomId: roomIdFor(row.building, row.name), capacity: row.capacity };
}

/**
 * Read a room record: `room_id` when present, else the id derived from
 * building and name, else a random id. Non-numeric capacity is unknown.
 */
export function roomRefFromRecord(random: Random, record: InputRecord): RoomRef {
  const name = cellText(record["name"]);
  const building = cellText(record["building"]) ?? "";
  const roomId =
    aliasedText(record, COLUMN_ALIASES.room) ??
    (name ? roomIdFor(building, name) : randomUuid(random));
  return { roomId, capacity: cellInteger(record["capacity"]) };
}
