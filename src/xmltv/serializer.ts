/**
 * XMLTV Serializer
 * Renders a guide document to XMLTV bytes plus a gzip companion
 */

import { gzipSync } from 'zlib';
import { XMLBuilder } from 'fast-xml-parser';
import { CREDIT_ROLES } from '../types/guide';
import type { CreditRole, GuideChannel, GuideDocument, Icon, ProgramEntry } from '../types/guide';
import { SerializeError, errorMessage } from '../utils/errors';
import { formatXmltvTime } from '../utils/time';
import { validateXMLTV } from './validator';

interface XMLTVText {
  '@_lang': string;
  '#text': string;
}

interface XMLTVIcon {
  '@_src': string;
  '@_width'?: number;
  '@_height'?: number;
}

interface XMLTVChannel {
  '@_id': string;
  'display-name': XMLTVText;
  icon?: XMLTVIcon;
}

type XMLTVPerson = string | { '@_role': string; '#text': string };

type XMLTVCredits = Partial<Record<CreditRole, XMLTVPerson[]>>;

interface XMLTVProgramme {
  '@_start': string;
  '@_stop': string;
  '@_channel': string;
  title: XMLTVText;
  'sub-title'?: XMLTVText;
  desc?: XMLTVText;
  credits?: XMLTVCredits;
  date?: string;
  category?: XMLTVText[];
  icon?: XMLTVIcon;
  'episode-num'?: Array<{
    '@_system': string;
    '#text': string;
  }>;
  new?: string;
  live?: string;
}

export interface SerializeOptions {
  /** Offset in minutes used for start/stop/date attributes */
  utcOffsetMinutes: number;
  createArchive: boolean;
}

export interface SerializedGuide {
  xml: Buffer;
  gzip?: Buffer;
}

const builder = new XMLBuilder({
  ignoreAttributes: false,
  format: true,
  indentBy: '  ',
  suppressEmptyNode: true,
});

export class XMLTVSerializer {
  constructor(private readonly options: SerializeOptions) {}

  /**
   * Build the XMLTV string. Identical documents give identical output.
   */
  render(doc: GuideDocument): string {
    const channels = doc.channels.map((channel) => this.buildChannel(channel));
    const programmes = doc.channels.flatMap((channel) =>
      channel.programmes.map((program) => this.buildProgramme(program, channel.language))
    );

    const xmlObj = {
      '?xml': {
        '@_version': '1.0',
        '@_encoding': 'UTF-8',
      },
      tv: {
        '@_date': this.formatTime(doc.generatedAt),
        '@_generator-info-name': doc.generator.name,
        '@_generator-info-url': doc.generator.url,
        channel: channels,
        programme: programmes,
      },
    };

    return builder.build(xmlObj);
  }

  /**
   * Render, validate and encode one variant
   */
  serialize(doc: GuideDocument): SerializedGuide {
    let xmlContent: string;
    try {
      xmlContent = this.render(doc);
    } catch (error) {
      throw new SerializeError(doc.variant, `Failed to render ${doc.variant}: ${errorMessage(error)}`);
    }

    const validation = validateXMLTV(xmlContent, {
      channels: doc.channels.length,
      programmes: doc.channels.reduce((total, channel) => total + channel.programmes.length, 0),
    });
    if (!validation.valid) {
      throw new SerializeError(doc.variant, `XML validation failed for ${doc.variant}: ${validation.error}`);
    }

    const xml = Buffer.from(xmlContent, 'utf-8');
    if (!this.options.createArchive) {
      return { xml };
    }
    return { xml, gzip: gzipSync(xml, { level: 9 }) };
  }

  private buildChannel(channel: GuideChannel): XMLTVChannel {
    const xmltvChannel: XMLTVChannel = {
      '@_id': channel.id,
      'display-name': {
        '@_lang': channel.language,
        '#text': channel.displayName,
      },
    };

    if (channel.icon) {
      xmltvChannel.icon = buildIcon(channel.icon);
    }

    return xmltvChannel;
  }

  private buildProgramme(program: ProgramEntry, lang: string): XMLTVProgramme {
    const programme: XMLTVProgramme = {
      '@_start': this.formatTime(program.start),
      '@_stop': this.formatTime(program.end),
      '@_channel': program.channelId,
      title: {
        '@_lang': lang,
        '#text': program.title,
      },
    };

    if (program.subTitle) {
      programme['sub-title'] = {
        '@_lang': lang,
        '#text': program.subTitle,
      };
    }

    if (program.description) {
      programme.desc = {
        '@_lang': lang,
        '#text': program.description,
      };
    }

    if (program.credits && program.credits.length > 0) {
      const credits: XMLTVCredits = {};
      // Child order of <credits> is fixed by the DTD
      for (const role of CREDIT_ROLES) {
        const people = program.credits.filter((credit) => credit.role === role);
        if (people.length > 0) {
          credits[role] = people.map((person) =>
            person.character ? { '@_role': person.character, '#text': person.name } : person.name
          );
        }
      }
      programme.credits = credits;
    }

    if (program.date) {
      programme.date = program.date;
    }

    if (program.categories.length > 0) {
      programme.category = program.categories.map((category) => ({
        '@_lang': lang,
        '#text': category,
      }));
    }

    if (program.icon) {
      programme.icon = buildIcon(program.icon);
    }

    if (program.episode) {
      programme['episode-num'] = [
        {
          '@_system': 'xmltv_ns',
          '#text': program.episode.xmltvNs,
        },
        {
          '@_system': 'onscreen',
          '#text': program.episode.onscreen,
        },
      ];
    }

    if (program.isNew) {
      programme.new = '';
    }

    if (program.isLive) {
      programme.live = '';
    }

    return programme;
  }

  private formatTime(epochMs: number): string {
    return formatXmltvTime(epochMs, this.options.utcOffsetMinutes);
  }
}

function buildIcon({ src, width, height }: Icon): XMLTVIcon {
  return {
    '@_src': src,
    ...(width !== undefined ? { '@_width': width } : {}),
    ...(height !== undefined ? { '@_height': height } : {}),
  };
}
