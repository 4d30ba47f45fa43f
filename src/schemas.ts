/**
 * Response shapes of the JioSaavn-compatible catalog API.
 *
 * Only the fields the pipeline reads are declared; everything else is stripped.
 * Optional fields are modelled as `nullish` because the service omits and nulls
 * them interchangeably.
 */

import { z } from 'zod';

const optionalText = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? null : String(value)));

export const AssetLinkSchema = z.object({
  quality: z.string(),
  url: z.string(),
});
export type AssetLink = z.infer<typeof AssetLinkSchema>;

export const ArtistCreditSchema = z.object({
  name: z.string().nullish().transform((value) => value ?? ''),
  role: z.string().nullish(),
});
export type ArtistCredit = z.infer<typeof ArtistCreditSchema>;

// The album is sometimes an object and sometimes a bare name.
export const AlbumSchema = z.union([
  z.object({ name: z.string().nullish() }),
  z.string(),
]);
export type Album = z.infer<typeof AlbumSchema>;

const linkList = z
  .array(AssetLinkSchema)
  .nullish()
  .transform((value) => value ?? []);

const artistList = z
  .array(ArtistCreditSchema)
  .nullish()
  .transform((value) => value ?? []);

export const DetailRecordSchema = z.object({
  id: z.string(),
  name: z.string().nullish().transform((value) => value ?? 'Unknown'),
  year: optionalText,
  language: z.string().nullish(),
  label: z.string().nullish(),
  copyright: z.string().nullish(),
  url: z.string().nullish(),
  duration: z.number().nullish(),
  album: AlbumSchema.nullish(),
  artists: z
    .object({ primary: artistList, all: artistList })
    .nullish()
    .transform((value) => value ?? { primary: [], all: [] }),
  downloadUrl: linkList,
  image: linkList,
});
export type DetailRecord = z.infer<typeof DetailRecordSchema>;

const SearchEntrySchema = z.object({ id: z.string().nullish() });

const ResultGroupSchema = z.object({
  results: z
    .array(SearchEntrySchema)
    .nullish()
    .transform((value) => value ?? []),
});

export const SearchResponseSchema = z.object({
  success: z.boolean(),
  data: z
    .object({
      songs: ResultGroupSchema.nullish(),
      topQuery: ResultGroupSchema.nullish(),
    })
    .nullish(),
});

export const DetailResponseSchema = z.object({
  success: z.boolean(),
  data: z.union([z.array(DetailRecordSchema), DetailRecordSchema]).nullish(),
});
