/**
 * Zod Validation Schemas
 *
 * Request validation for the auth and trip endpoints.
 */

import { z } from "zod";

// ==================== Constants ====================

export const LIMITS = {
  EMAIL_MAX: 255,
  // bcrypt only reads the first 72 bytes
  PASSWORD_MIN: 6,
  PASSWORD_MAX: 72,
  DISPLAY_NAME_MAX: 100,

  TITLE_MAX: 200,
  DESCRIPTION_MAX: 5000,
  MAX_PHOTOS: 50,
  PHOTO_URL_MAX: 2048,
  MAX_TAGS: 30,
  TAG_MAX: 50,

  SEARCH_QUERY_MAX: 200,
} as const;

// ==================== Auth ====================

const EmailSchema = z
  .string({ required_error: "Email is required" })
  .trim()
  .min(1, "Email is required")
  .max(LIMITS.EMAIL_MAX, `Email must be at most ${LIMITS.EMAIL_MAX} characters`)
  .email("Email should be valid");

export const RegisterSchema = z.object({
  email: EmailSchema,
  password: z
    .string({ required_error: "Password is required" })
    .min(LIMITS.PASSWORD_MIN, `Password must be at least ${LIMITS.PASSWORD_MIN} characters`)
    .max(LIMITS.PASSWORD_MAX, `Password must be at most ${LIMITS.PASSWORD_MAX} characters`),
  displayName: z
    .string()
    .trim()
    .max(LIMITS.DISPLAY_NAME_MAX, `Display name must be at most ${LIMITS.DISPLAY_NAME_MAX} characters`)
    .optional(),
});

export const LoginSchema = z.object({
  email: EmailSchema,
  password: z.string({ required_error: "Password is required" }).min(1, "Password is required"),
});

// ==================== Trips ====================

const LatitudeSchema = z
  .number()
  .min(-90, "Latitude must be between -90 and 90")
  .max(90, "Latitude must be between -90 and 90");

const LongitudeSchema = z
  .number()
  .min(-180, "Longitude must be between -180 and 180")
  .max(180, "Longitude must be between -180 and 180");

const PhotosSchema = z
  .array(z.string().min(1).max(LIMITS.PHOTO_URL_MAX))
  .max(LIMITS.MAX_PHOTOS, `At most ${LIMITS.MAX_PHOTOS} photos`);

const TagsSchema = z
  .array(z.string().trim().min(1).max(LIMITS.TAG_MAX))
  .max(LIMITS.MAX_TAGS, `At most ${LIMITS.MAX_TAGS} tags`);

const TitleSchema = z
  .string({ required_error: "Title is required" })
  .trim()
  .min(1, "Title is required")
  .max(LIMITS.TITLE_MAX, `Title must be at most ${LIMITS.TITLE_MAX} characters`);

export const CreateTripSchema = z.object({
  title: TitleSchema,
  description: z.string().max(LIMITS.DESCRIPTION_MAX).nullable().optional(),
  photos: PhotosSchema.optional(),
  tags: TagsSchema.optional(),
  latitude: LatitudeSchema.nullable().optional(),
  longitude: LongitudeSchema.nullable().optional(),
});

/** Every field optional; only the fields sent are changed */
export const UpdateTripSchema = CreateTripSchema.partial();

export const TripIdParamSchema = z.object({
  id: z.coerce.number().int().positive("Trip id must be a positive integer"),
});

export const SearchQuerySchema = z.object({
  q: z.string().max(LIMITS.SEARCH_QUERY_MAX).optional().default(""),
});
