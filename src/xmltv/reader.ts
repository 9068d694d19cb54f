/**
 * XMLTV Reader
 * Parses an XMLTV document back into plain values
 */

import { XMLParser } from 'fast-xml-parser';
import { z } from 'zod';
import { CREDIT_ROLES } from '../types/guide';
import type { Credit } from '../types/guide';
import { parseXmltvTime } from '../utils/time';

const ARRAY_TAGS = new Set<string>([
  'channel',
  'programme',
  'display-name',
  'icon',
  'title',
  'sub-title',
  'desc',
  'category',
  'episode-num',
  ...CREDIT_ROLES,
]);

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: '#text',
  parseTagValue: false,
  parseAttributeValue: false,
  alwaysCreateTextNode: true,
  isArray: (name) => ARRAY_TAGS.has(name),
});

const TextNodeSchema = z
  .object({
    '#text': z.string().default(''),
    '@_lang': z.string().optional(),
  })
  .passthrough();

const IconNodeSchema = z
  .object({
    '@_src': z.string(),
    '@_width': z.string().optional(),
    '@_height': z.string().optional(),
  })
  .passthrough();

const PersonNodeSchema = z
  .object({
    '#text': z.string().default(''),
    '@_role': z.string().optional(),
  })
  .passthrough();

const CreditsNodeSchema = z
  .object({
    director: z.array(PersonNodeSchema).optional(),
    actor: z.array(PersonNodeSchema).optional(),
    writer: z.array(PersonNodeSchema).optional(),
    producer: z.array(PersonNodeSchema).optional(),
    composer: z.array(PersonNodeSchema).optional(),
    presenter: z.array(PersonNodeSchema).optional(),
    guest: z.array(PersonNodeSchema).optional(),
  })
  .passthrough();

const ChannelNodeSchema = z
  .object({
    '@_id': z.string(),
    'display-name': z.array(TextNodeSchema).default([]),
    icon: z.array(IconNodeSchema).optional(),
  })
  .passthrough();

const ProgrammeNodeSchema = z
  .object({
    '@_start': z.string(),
    '@_stop': z.string().optional(),
    '@_channel': z.string(),
    title: z.array(TextNodeSchema).min(1),
    'sub-title': z.array(TextNodeSchema).optional(),
    desc: z.array(TextNodeSchema).optional(),
    credits: CreditsNodeSchema.optional(),
    date: TextNodeSchema.optional(),
    category: z.array(TextNodeSchema).optional(),
    icon: z.array(IconNodeSchema).optional(),
    new: z.unknown().optional(),
    live: z.unknown().optional(),
  })
  .passthrough();

const DocumentSchema = z
  .object({
    tv: z
      .object({
        '@_date': z.string().optional(),
        '@_generator-info-name': z.string().optional(),
        channel: z.array(ChannelNodeSchema).default([]),
        programme: z.array(ProgrammeNodeSchema).default([]),
      })
      .passthrough(),
  })
  .passthrough();

export interface ParsedChannel {
  id: string;
  displayName: string;
  icon?: string;
}

export interface ParsedProgramme {
  channel: string;
  start: number;
  stop?: number;
  title: string;
  subTitle?: string;
  description?: string;
  credits?: Credit[];
  date?: string;
  categories: string[];
  icon?: string;
  isNew: boolean;
  isLive: boolean;
}

export interface ParsedGuide {
  date?: string;
  generatorName?: string;
  channels: ParsedChannel[];
  programmes: ParsedProgramme[];
}

/**
 * Parse XMLTV text. Throws when the document has no <tv> root or a time cannot be read.
 */
export function parseGuide(xmlString: string): ParsedGuide {
  const parsed = DocumentSchema.safeParse(parser.parse(xmlString));
  if (!parsed.success) {
    throw new Error(`Not an XMLTV document: ${parsed.error.issues[0]?.message ?? 'unknown shape'}`);
  }

  const { tv } = parsed.data;

  const channels = tv.channel.map((node): ParsedChannel => {
    const channel: ParsedChannel = {
      id: node['@_id'],
      displayName: node['display-name'][0]?.['#text'] ?? '',
    };
    const icon = node.icon?.[0];
    if (icon) {
      channel.icon = icon['@_src'];
    }
    return channel;
  });

  const programmes = tv.programme.map((node): ParsedProgramme => {
    const start = readTime(node['@_start']);
    const programme: ParsedProgramme = {
      channel: node['@_channel'],
      start,
      title: node.title[0]?.['#text'] ?? '',
      categories: (node.category ?? []).map((category) => category['#text']),
      isNew: node.new !== undefined,
      isLive: node.live !== undefined,
    };
    if (node['@_stop'] !== undefined) {
      programme.stop = readTime(node['@_stop']);
    }
    const subTitle = node['sub-title']?.[0]?.['#text'];
    if (subTitle) {
      programme.subTitle = subTitle;
    }
    const description = node.desc?.[0]?.['#text'];
    if (description) {
      programme.description = description;
    }
    if (node.credits) {
      const creditsNode = node.credits;
      programme.credits = CREDIT_ROLES.flatMap((role) =>
        (creditsNode[role] ?? []).map((person): Credit => {
          const credit: Credit = { role, name: person['#text'] };
          if (person['@_role']) {
            credit.character = person['@_role'];
          }
          return credit;
        })
      );
    }
    const date = node.date?.['#text'];
    if (date) {
      programme.date = date;
    }
    const icon = node.icon?.[0];
    if (icon) {
      programme.icon = icon['@_src'];
    }
    return programme;
  });

  return {
    date: tv['@_date'],
    generatorName: tv['@_generator-info-name'],
    channels,
    programmes,
  };
}

function readTime(value: string): number {
  const parsed = parseXmltvTime(value);
  if (parsed === null) {
    throw new Error(`Invalid XMLTV time "${value}"`);
  }
  return parsed;
}
