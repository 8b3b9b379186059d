/**
 * Trip storage backed by SQLite
 *
 * Photos and tags are kept as JSON arrays in TEXT columns. Title,
 * description and tags also have lower-cased copies that search matches
 * against. Reads that show a trip join in the author so callers need no
 * second lookup.
 */

import { z } from "zod";
import type { DatabaseHandle, SqlValue } from "./db";
import { createLogger } from "../logging";
import type { NewTrip, Trip, TripChanges, TripDetail } from "../types";

const log = createLogger("trips");

const TripRow = z.object({
  id: z.number().int(),
  title: z.string(),
  description: z.string().nullable(),
  photos: z.string(),
  tags: z.string(),
  latitude: z.number().nullable(),
  longitude: z.number().nullable(),
  author_id: z.number().int(),
  created_at: z.string(),
  updated_at: z.string(),
});

type TripRow = z.infer<typeof TripRow>;

const TripDetailRow = TripRow.extend({
  author_email: z.string(),
  author_display_name: z.string().nullable(),
});

type TripDetailRow = z.infer<typeof TripDetailRow>;

const TRIP_COLUMNS = `t.id, t.title, t.description, t.photos, t.tags, t.latitude,
  t.longitude, t.author_id, t.created_at, t.updated_at`;

const DETAIL_SELECT = `SELECT ${TRIP_COLUMNS}, u.email AS author_email,
  u.display_name AS author_display_name
  FROM trips t JOIN users u ON u.id = t.author_id`;

const NEWEST_FIRST = "ORDER BY t.created_at DESC, t.id DESC";

const RETURNING = `RETURNING id, title, description, photos, tags, latitude, longitude,
  author_id, created_at, updated_at`;

function fold(text: string): string {
  return text.toLowerCase();
}

function parseList(raw: string, tripId: number, column: string): string[] {
  try {
    const value: unknown = JSON.parse(raw);
    if (Array.isArray(value)) {
      return value.filter((item): item is string => typeof item === "string");
    }
  } catch (err) {
    log.warn("Unreadable list column", { tripId, column, error: String(err) });
  }
  return [];
}

function toTrip(row: TripRow): Trip {
  return {
    id: row.id,
    title: row.title,
    description: row.description,
    photos: parseList(row.photos, row.id, "photos"),
    tags: parseList(row.tags, row.id, "tags"),
    latitude: row.latitude,
    longitude: row.longitude,
    ownerId: row.author_id,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toDetail(row: TripDetailRow): TripDetail {
  return {
    ...toTrip(row),
    authorId: row.author_id,
    authorEmail: row.author_email,
    authorDisplayName: row.author_display_name,
  };
}

/** Escape LIKE wildcards so the query matches literally */
function likePattern(query: string): string {
  return `%${query.replace(/[\\%_]/g, (ch) => `\\${ch}`)}%`;
}

/**
 * Column assignments for the fields a partial update carries. A field that
 * is absent or null is left as it is.
 */
function assignmentsFor(changes: TripChanges): [column: string, value: SqlValue][] {
  const assignments: [string, SqlValue][] = [];

  if (changes.title != null) {
    assignments.push(["title", changes.title], ["search_title", fold(changes.title)]);
  }
  if (changes.description != null) {
    assignments.push(
      ["description", changes.description],
      ["search_description", fold(changes.description)]
    );
  }
  if (changes.photos != null) {
    assignments.push(["photos", JSON.stringify(changes.photos)]);
  }
  if (changes.tags != null) {
    assignments.push(
      ["tags", JSON.stringify(changes.tags)],
      ["search_tags", JSON.stringify(changes.tags.map(fold))]
    );
  }
  if (changes.latitude != null) {
    assignments.push(["latitude", changes.latitude]);
  }
  if (changes.longitude != null) {
    assignments.push(["longitude", changes.longitude]);
  }

  return assignments;
}

export class TripStorage {
  constructor(private readonly db: DatabaseHandle) {}

  /** Newest first */
  listAll(): Trip[] {
    return this.db.all(`SELECT ${TRIP_COLUMNS} FROM trips t ${NEWEST_FIRST}`, TripRow).map(toTrip);
  }

  /**
   * Case-insensitive substring match over title, description and each tag.
   * A blank query lists everything.
   */
  search(query: string): Trip[] {
    const trimmed = query.trim();
    if (trimmed === "") {
      return this.listAll();
    }

    const pattern = likePattern(fold(trimmed));
    return this.db
      .all(
        `SELECT ${TRIP_COLUMNS} FROM trips t
         WHERE t.search_title LIKE ? ESCAPE '\\'
            OR t.search_description LIKE ? ESCAPE '\\'
            OR EXISTS (
              SELECT 1 FROM json_each(t.search_tags) tag WHERE tag.value LIKE ? ESCAPE '\\'
            )
         ${NEWEST_FIRST}`,
        TripRow,
        [pattern, pattern, pattern]
      )
      .map(toTrip);
  }

  findById(id: number): TripDetail | null {
    const row = this.db.get(`${DETAIL_SELECT} WHERE t.id = ?`, TripDetailRow, [id]);
    return row ? toDetail(row) : null;
  }

  findByAuthor(authorId: number): TripDetail[] {
    return this.db
      .all(`${DETAIL_SELECT} WHERE t.author_id = ? ${NEWEST_FIRST}`, TripDetailRow, [authorId])
      .map(toDetail);
  }

  create(authorId: number, trip: NewTrip): Trip {
    const tags = trip.tags ?? [];
    const description = trip.description ?? null;

    const row = this.db.get(
      `INSERT INTO trips (title, description, photos, tags, latitude, longitude, author_id,
                          search_title, search_description, search_tags)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
       ${RETURNING}`,
      TripRow,
      [
        trip.title,
        description,
        JSON.stringify(trip.photos ?? []),
        JSON.stringify(tags),
        trip.latitude ?? null,
        trip.longitude ?? null,
        authorId,
        fold(trip.title),
        fold(description ?? ""),
        JSON.stringify(tags.map(fold)),
      ]
    );

    if (!row) {
      throw new Error("Insert into trips returned no row");
    }
    log.debug("Trip created", { tripId: row.id, authorId });
    return toTrip(row);
  }

  /**
   * Apply the fields present in `changes` and refresh updated_at.
   * Returns null when no trip has that id.
   */
  update(id: number, changes: TripChanges): Trip | null {
    const assignments = assignmentsFor(changes);

    const columns = assignments.map(([column]) => `${column} = ?`);
    columns.push("updated_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now')");

    const row = this.db.get(
      `UPDATE trips SET ${columns.join(", ")} WHERE id = ? ${RETURNING}`,
      TripRow,
      [...assignments.map(([, value]) => value), id]
    );

    return row ? toTrip(row) : null;
  }

  /** Returns true when a row was removed */
  delete(id: number): boolean {
    return this.db.run("DELETE FROM trips WHERE id = ?", [id]).changes > 0;
  }
}
