// src/core/catalog/schemas.ts
import { z } from 'zod';
import type { CatalogItem, VideoDetail } from '../types/index.js';

const text = z.string().nullish().transform((value) => value ?? '');
const count = z.coerce.number().int().nonnegative().nullish().transform((value) => value ?? 0);
const strings = z
  .array(z.string().nullable())
  .nullish()
  .transform((values) => (values ?? []).map((value) => value ?? ''));

export const EnvelopeSchema = z.object({
  code: z.coerce.number(),
  msg: z.string().nullish(),
  data: z.unknown().optional(),
});

export const LoginDataSchema = z.object({
  token: z.string().min(1),
});

export const CatalogItemSchema = z
  .object({
    id: z.union([z.string().min(1), z.number()]).transform(String),
    title: text,
    tags: strings,
    total_episodes: count,
  })
  .passthrough();

export const ListDataSchema = z.object({
  total: count,
  list: z.array(CatalogItemSchema).nullish().transform((items) => items ?? []),
});

export const VideoDetailSchema = z
  .object({
    title: text,
    video_list: strings,
    cover: text,
    desc: text,
    c_desc: text,
    download_url: text,
    free_watch_episodes: count,
  })
  .passthrough();

export const DetailDataSchema = z.object({
  list: z.array(VideoDetailSchema).nullish().transform((items) => items ?? []),
});

export function toCatalogItem(raw: z.infer<typeof CatalogItemSchema>): CatalogItem {
  return {
    externalId: raw.id,
    title: raw.title,
    tags: raw.tags,
    totalEpisodes: raw.total_episodes,
  };
}

export function toVideoDetail(raw: z.infer<typeof VideoDetailSchema>): VideoDetail {
  return {
    title: raw.title,
    mediaList: raw.video_list,
    coverUrl: raw.cover,
    description: raw.desc || raw.c_desc,
    downloadUrl: raw.download_url,
    freeEpisodes: raw.free_watch_episodes,
  };
}
