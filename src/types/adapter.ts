import { z } from 'zod';

// Feeds occasionally emit numeric titles or links; read them as text
const textSchema = z.union([z.string(), z.number()]).transform(value => String(value));

// Reader-API link entry (canonical / alternate lists)
const linkSchema = z
  .object({
    href: z.string().nullish()
  })
  .passthrough();

/**
 * One item of a Google Reader compatible `stream/contents` response.
 * Only the fields the digest reads are typed; everything else passes through.
 */
export const rawRecordSchema = z
  .object({
    id: z.string().nullish(),
    title: textSchema.nullish(),
    canonical: z.array(linkSchema).nullish(),
    alternate: z.array(linkSchema).nullish(),
    link: textSchema.nullish(),
    origin: z
      .object({
        title: textSchema.nullish(),
        htmlUrl: z.string().nullish(),
        streamId: z.string().nullish()
      })
      .passthrough()
      .nullish(),
    // Epoch seconds when well-formed; anything else means "unknown"
    published: z.unknown(),
    updated: z.unknown(),
    // Read only by the label filter, which parses it on its own
    categories: z.unknown()
  })
  .passthrough();

export type RawRecord = z.infer<typeof rawRecordSchema>;

export const streamContentsSchema = z
  .object({
    items: z.array(z.unknown()).nullish()
  })
  .passthrough();

export type StreamContents = z.infer<typeof streamContentsSchema>;
