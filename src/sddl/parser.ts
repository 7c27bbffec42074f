/**
 * SDDL — Parser and Formatter
 *
 * Parses a security descriptor string into a SecurityDescriptor and writes
 * it back. Errors carry the character position where parsing stopped.
 */

import { SddlParseError } from "../errors.js";
import { formatRights, rightCodeMask } from "./rights.js";
import {
  ACE_FLAGS,
  ACE_TYPES,
  ACL_FLAGS,
  type Ace,
  type AceFlag,
  type AceType,
  type Acl,
  type AclFlag,
  type SecurityDescriptor,
} from "./types.js";

const SECTION_TAGS = new Set(["O", "G", "D", "S"]);

function isAceType(value: string): value is AceType {
  return ACE_TYPES.some((t) => t === value);
}

function isAceFlag(value: string): value is AceFlag {
  return ACE_FLAGS.some((f) => f === value);
}

/**
 * Recursive-descent parser over one SDDL string.
 */
export class SddlParser {
  private input: string;

  constructor(input: string) {
    this.input = input;
  }

  parse(): SecurityDescriptor {
    const sd: SecurityDescriptor = {};
    const seen = new Set<string>();
    let pos = this.skipWhitespace(0);
    const end = this.input.trimEnd().length;

    while (pos < end) {
      const tag = this.input[pos].toUpperCase();
      if (this.input[pos + 1] !== ":" || !SECTION_TAGS.has(tag)) {
        throw this.error(`Unknown section '${this.input.slice(pos, pos + 2)}'`, pos);
      }
      if (seen.has(tag)) throw this.error(`Duplicate section '${tag}:'`, pos);
      seen.add(tag);

      const bodyStart = pos + 2;
      const bodyEnd = this.findSectionEnd(bodyStart, end);

      switch (tag) {
        case "O":
          sd.owner = this.parseSid(bodyStart, bodyEnd);
          break;
        case "G":
          sd.group = this.parseSid(bodyStart, bodyEnd);
          break;
        case "D":
          sd.dacl = this.parseAcl(bodyStart, bodyEnd);
          break;
        case "S":
          sd.sacl = this.parseAcl(bodyStart, bodyEnd);
          break;
      }

      pos = bodyEnd;
    }

    return sd;
  }

  // ---------------------------------------------------------------------------
  // Sections
  // ---------------------------------------------------------------------------

  /**
   * A section runs until the tag of the next one (a letter followed by `:`
   * outside any parentheses) or the end of input.
   */
  private findSectionEnd(start: number, end: number): number {
    const open: number[] = [];

    for (let i = start; i < end; i++) {
      const ch = this.input[i];
      if (ch === "(") {
        open.push(i);
      } else if (ch === ")") {
        if (open.pop() === undefined) throw this.error("Unbalanced parentheses", i);
      } else if (ch === ":" && open.length === 0) {
        if (i - 1 < start) throw this.error("Unexpected ':'", i);
        return i - 1;
      }
    }

    const unclosed = open[0];
    if (unclosed !== undefined) throw this.error("Unbalanced parentheses", unclosed);
    return end;
  }

  private parseSid(start: number, end: number): string {
    const sid = this.input.slice(start, end).trim();
    if (sid.length === 0) throw this.error("Missing SID", start);
    return sid;
  }

  private parseAcl(start: number, end: number): Acl {
    const flags: AclFlag[] = [];
    const aces: Ace[] = [];
    let pos = start;

    while (pos < end && this.input[pos] !== "(") {
      const flag = ACL_FLAGS.find((f) => this.input.startsWith(f, pos));
      if (!flag) throw this.error(`Unknown ACL flag '${this.input.slice(pos, Math.min(pos + 2, end))}'`, pos);
      flags.push(flag);
      pos += flag.length;
    }

    while (pos < end) {
      pos = this.skipWhitespace(pos);
      if (pos >= end) break;
      if (this.input[pos] !== "(") throw this.error(`Unexpected character '${this.input[pos]}'`, pos);

      const close = this.findClose(pos, end);
      aces.push(this.parseAce(pos, close));
      pos = close + 1;
    }

    return { flags, aces };
  }

  private findClose(open: number, end: number): number {
    let depth = 0;
    for (let i = open; i < end; i++) {
      if (this.input[i] === "(") depth++;
      else if (this.input[i] === ")") {
        depth--;
        if (depth === 0) return i;
      }
    }
    throw this.error("Unbalanced parentheses", open);
  }

  // ---------------------------------------------------------------------------
  // ACEs
  // ---------------------------------------------------------------------------

  /** `open` and `close` are the positions of the surrounding parentheses. */
  private parseAce(open: number, close: number): Ace {
    const body = this.input.slice(open + 1, close);
    const fields = body.split(";");
    if (fields.length !== 6) {
      throw this.error(`ACE has ${fields.length} fields, expected 6`, open);
    }

    const offsets: number[] = [];
    let cursor = open + 1;
    for (const field of fields) {
      offsets.push(cursor);
      cursor += field.length + 1;
    }

    const [typeText, flagText, rightsText, objectGuid, inheritObjectGuid, sidText] = fields;

    const type = typeText.toUpperCase();
    if (!isAceType(type)) throw this.error(`Unknown ACE type '${typeText}'`, offsets[0]);

    const sid = sidText.trim();
    if (sid.length === 0) throw this.error("Missing SID", offsets[5]);

    return {
      type,
      flags: this.parseAceFlags(flagText, offsets[1]),
      rights: this.parseRights(rightsText, offsets[2]),
      objectGuid,
      inheritObjectGuid,
      sid,
    };
  }

  private parseAceFlags(text: string, offset: number): AceFlag[] {
    if (text.length % 2 !== 0) throw this.error(`Malformed ACE flags '${text}'`, offset);

    const flags: AceFlag[] = [];
    for (let i = 0; i < text.length; i += 2) {
      const flag = text.slice(i, i + 2).toUpperCase();
      if (!isAceFlag(flag)) throw this.error(`Unknown ACE flag '${text.slice(i, i + 2)}'`, offset + i);
      flags.push(flag);
    }
    return flags;
  }

  private parseRights(text: string, offset: number): number {
    if (text.length === 0) return 0;
    const hex = /^0x[0-9a-f]+$/i.test(text);
    if (hex || /^\d+$/.test(text)) {
      const value = hex ? Number.parseInt(text.slice(2), 16) : Number(text);
      if (value > 0xffffffff) throw this.error(`Access mask '${text}' does not fit in 32 bits`, offset);
      return value;
    }
    if (text.length % 2 !== 0) throw this.error(`Malformed access rights '${text}'`, offset);

    let mask = 0;
    for (let i = 0; i < text.length; i += 2) {
      const code = text.slice(i, i + 2);
      const bits = rightCodeMask(code);
      if (bits === undefined) throw this.error(`Unknown access right '${code}'`, offset + i);
      mask |= bits;
    }
    return mask >>> 0;
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private skipWhitespace(pos: number): number {
    let i = pos;
    while (i < this.input.length && /\s/.test(this.input[i])) i++;
    return i;
  }

  private error(message: string, position: number): SddlParseError {
    return new SddlParseError(message, this.input, position);
  }
}

export function parseSddl(text: string): SecurityDescriptor {
  return new SddlParser(text).parse();
}

// =============================================================================
// Formatting
// =============================================================================

export function formatAce(ace: Ace): string {
  return `(${ace.type};${ace.flags.join("")};${formatRights(ace.rights)};${ace.objectGuid};${ace.inheritObjectGuid};${ace.sid})`;
}

function formatAcl(acl: Acl): string {
  return `${acl.flags.join("")}${acl.aces.map(formatAce).join("")}`;
}

/**
 * Canonical string form. Sections are written in O, G, D, S order.
 */
export function formatSddl(sd: SecurityDescriptor): string {
  let out = "";
  if (sd.owner !== undefined) out += `O:${sd.owner}`;
  if (sd.group !== undefined) out += `G:${sd.group}`;
  if (sd.dacl !== undefined) out += `D:${formatAcl(sd.dacl)}`;
  if (sd.sacl !== undefined) out += `S:${formatAcl(sd.sacl)}`;
  return out;
}
