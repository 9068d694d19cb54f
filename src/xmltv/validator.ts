/**
 * XML Validation
 * Generated XML is checked before it is handed to the writer: never publish unvalidated XML
 */

import { XMLValidator } from 'fast-xml-parser';
import { errorMessage } from '../utils/errors';
import { parseGuide } from './reader';

export interface ValidationResult {
  valid: boolean;
  error?: string;
}

export interface ExpectedCounts {
  channels: number;
  programmes: number;
}

/**
 * Validate XML string is well-formed
 */
export function validateXML(xmlString: string): ValidationResult {
  if (!xmlString || xmlString.trim().length === 0) {
    return {
      valid: false,
      error: 'XML string is empty',
    };
  }

  // Check for XML declaration
  if (!xmlString.trim().startsWith('<?xml')) {
    return {
      valid: false,
      error: 'Missing XML declaration',
    };
  }

  const result = XMLValidator.validate(xmlString);
  if (result !== true) {
    return {
      valid: false,
      error: `XML parsing failed at line ${result.err.line}: ${result.err.msg}`,
    };
  }

  return {
    valid: true,
  };
}

/**
 * Validate XMLTV structure
 * Checks the <tv> root, readable times, and (optionally) element counts
 */
export function validateXMLTV(xmlString: string, expected?: ExpectedCounts): ValidationResult {
  // First check if well-formed
  const basicValidation = validateXML(xmlString);
  if (!basicValidation.valid) {
    return basicValidation;
  }

  try {
    const guide = parseGuide(xmlString);

    if (guide.channels.length === 0) {
      return {
        valid: false,
        error: 'No channels found in XMLTV',
      };
    }

    const channelIds = new Set(guide.channels.map((channel) => channel.id));
    const orphan = guide.programmes.find((programme) => !channelIds.has(programme.channel));
    if (orphan) {
      return {
        valid: false,
        error: `Programme references unknown channel "${orphan.channel}"`,
      };
    }

    if (expected && (guide.channels.length !== expected.channels || guide.programmes.length !== expected.programmes)) {
      return {
        valid: false,
        error:
          `Expected ${expected.channels} channels and ${expected.programmes} programmes, ` +
          `found ${guide.channels.length} and ${guide.programmes.length}`,
      };
    }

    return {
      valid: true,
    };
  } catch (error) {
    return {
      valid: false,
      error: `XMLTV validation failed: ${errorMessage(error)}`,
    };
  }
}
