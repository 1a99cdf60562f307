import { z } from 'zod';

/** The subset of yt-dlp's `.info.json` that the uploader reads. */
export const infoJsonSchema = z
  .object({
    id: z.union([z.string(), z.number()]).transform(String).optional(),
    title: z.string().optional(),
    description: z.string().nullish(),
    duration: z.number().nullish(),
    thumbnail: z.string().nullish(),
    uploader: z.string().nullish(),
    webpage_url: z.string().nullish(),
  })
  .passthrough();

export type InfoJson = z.infer<typeof infoJsonSchema>;

export interface FacebookExtractorOptions {
  ytdlpPath: string;
  timeoutMs: number;
  cookiesB64: string;
  geoBypassCountry: string;
  verbose: boolean;
}
