/**
 * Channel Registry
 * Loads the fixed channel list and joins it with the per-variant icon manifests
 */

import { readFileSync } from 'fs';
import path from 'path';
import { DateTime } from 'luxon';
import { z } from 'zod';
import { GUIDE_VARIANTS } from '../types/guide';
import type { Channel, ChannelIcon, GuideVariant } from '../types/guide';
import { RegistryError, errorMessage } from '../utils/errors';

const ChannelRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  lookupKey: z.string().min(1).nullable().default(null),
  language: z.string().min(1).default('en'),
  timeZone: z.string().min(1).optional(),
});

const ChannelListSchema = z.array(ChannelRecordSchema);

const IconManifestSchema = z.record(
  z.object({
    path: z.string().min(1),
    width: z.number().int().positive().optional(),
    height: z.number().int().positive().optional(),
  }),
);

export type ChannelRecord = z.infer<typeof ChannelRecordSchema>;
export type IconManifest = z.infer<typeof IconManifestSchema>;

export function manifestFileName(variant: GuideVariant): string {
  return `channels-${variant}.json`;
}

/**
 * Build an icon reference the way the icons are published: <base>/images/icons/<path>
 */
export function iconFromManifest(manifest: IconManifest, channelId: string, baseUrl: string): ChannelIcon | undefined {
  const entry = manifest[channelId];
  if (!entry) {
    return undefined;
  }

  const base = baseUrl.replace(/\/+$/, '');
  const iconPath = entry.path.replace(/^\/+/, '');
  return {
    src: `${base}/images/icons/${iconPath}`,
    width: entry.width,
    height: entry.height,
  };
}

/**
 * Join channel records with icon manifests into immutable channels.
 * Order of `records` is the guide order.
 */
export function buildRegistry(
  records: ChannelRecord[],
  manifests: Partial<Record<GuideVariant, IconManifest>>,
  iconsBaseUrl: string
): readonly Channel[] {
  const seen = new Set<string>();
  const channels: Channel[] = [];

  for (const record of records) {
    if (seen.has(record.id)) {
      throw new RegistryError(`Duplicate channel id "${record.id}"`, { channelId: record.id });
    }
    seen.add(record.id);

    if (record.timeZone && !DateTime.now().setZone(record.timeZone).isValid) {
      throw new RegistryError(`Unknown time zone "${record.timeZone}" for channel "${record.id}"`, {
        channelId: record.id,
      });
    }

    const icons: Partial<Record<GuideVariant, ChannelIcon>> = {};
    for (const variant of GUIDE_VARIANTS) {
      const manifest = manifests[variant];
      const icon = manifest ? iconFromManifest(manifest, record.id, iconsBaseUrl) : undefined;
      if (icon) {
        icons[variant] = icon;
      } else {
        console.warn(`No ${variant} icon for channel "${record.id}"`);
      }
    }

    channels.push(
      Object.freeze({
        id: record.id,
        name: record.name,
        lookupKey: record.lookupKey,
        language: record.language,
        timeZone: record.timeZone,
        icons: Object.freeze(icons),
      })
    );
  }

  return Object.freeze(channels);
}

/**
 * Load channels.json and icons/channels-<variant>.json from the data directory
 */
export function loadChannelRegistry(dataDir: string, iconsBaseUrl: string): readonly Channel[] {
  const channelsPath = path.join(dataDir, 'channels.json');
  const records = parseFile(ChannelListSchema, channelsPath);

  const manifests: Partial<Record<GuideVariant, IconManifest>> = {};
  for (const variant of GUIDE_VARIANTS) {
    manifests[variant] = parseFile(IconManifestSchema, path.join(dataDir, 'icons', manifestFileName(variant)));
  }

  const channels = buildRegistry(records, manifests, iconsBaseUrl);
  console.log(`Loaded ${channels.length} channels from ${dataDir}`);
  return channels;
}

function parseFile<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, filePath: string): T {
  let data: unknown;
  try {
    data = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new RegistryError(`Failed to read ${filePath}: ${errorMessage(error)}`, { filePath });
  }

  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new RegistryError(`Invalid ${path.basename(filePath)}: ${parsed.error.message}`, {
      filePath,
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}
