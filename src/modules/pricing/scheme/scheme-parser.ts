/**
 * Scheme Parser
 *
 * Classifies scheme lines. Grammar, one entry per line:
 *
 *   {id} -> EXPR                 item (coupon when id starts with "C")
 *   {name} -> {id}{id}...=EXPR   rule
 *
 * Blank lines and lines starting with "#" are skipped.
 */

import { MalformedSchemeEntryError } from "@/lib/errors";

import type { ParsedSchemeLine, SchemeEntry } from "./types";

const ENTRY_SEPARATOR = "->";
const RULE_SEPARATOR = "=";
const KEY_PATTERN = /^\{([^{}]+)\}$/;
const ITEM_LIST_PATTERN = /^\s*(?:\{[^{}]+\}\s*)+$/;
const ITEM_TOKEN_PATTERN = /\{([^{}]+)\}/g;

/**
 * Parse a single line. Throws MalformedSchemeEntryError when the line does
 * not follow the grammar.
 */
export function parseSchemeLine(rawLine: string, line: number): SchemeEntry {
  const text = rawLine.trim();

  if (text === "" || text.startsWith("#")) {
    return { type: "SKIP", line };
  }

  const parts = text.split(ENTRY_SEPARATOR);
  if (parts.length !== 2) {
    throw new MalformedSchemeEntryError(`Expected exactly one '${ENTRY_SEPARATOR}' separator`);
  }

  const key = parseKey(parts[0].trim());
  const value = parts[1].trim();
  if (value === "") {
    throw new MalformedSchemeEntryError(`Missing value for {${key}}`);
  }

  if (!value.includes(RULE_SEPARATOR)) {
    return { type: "ITEM", line, id: key, expression: value };
  }

  const valueParts = value.split(RULE_SEPARATOR);
  if (valueParts.length !== 2) {
    throw new MalformedSchemeEntryError(`Expected exactly one '${RULE_SEPARATOR}' in rule {${key}}`);
  }

  const itemList = valueParts[0].trim();
  const expression = valueParts[1].trim();

  if (expression === "") {
    throw new MalformedSchemeEntryError(`Missing amount expression for rule {${key}}`);
  }

  return {
    type: "RULE",
    line,
    name: key,
    itemIds: parseItemList(itemList, key),
    expression,
  };
}

/**
 * Split source text into classified entries, keeping parse failures in place
 */
export function parseSchemeSource(source: string): ParsedSchemeLine[] {
  return source.split(/\r?\n/).map((text, index) => {
    const line = index + 1;
    try {
      return { text, line, entry: parseSchemeLine(text, line) };
    } catch (error) {
      if (error instanceof MalformedSchemeEntryError) {
        return { text, line, error };
      }
      throw error;
    }
  });
}

function parseKey(key: string): string {
  const match = KEY_PATTERN.exec(key);
  if (!match) {
    throw new MalformedSchemeEntryError(`Key must be a single {...} group, got "${key}"`);
  }

  const name = match[1].trim();
  if (name === "") {
    throw new MalformedSchemeEntryError(`Key must not be empty`);
  }
  return name;
}

function parseItemList(itemList: string, ruleName: string): string[] {
  // An empty list parses; rule construction rejects it
  if (itemList === "") {
    return [];
  }

  if (!ITEM_LIST_PATTERN.test(itemList)) {
    throw new MalformedSchemeEntryError(
      `Rule {${ruleName}} must list its items as {id} groups, got "${itemList}"`
    );
  }

  return [...itemList.matchAll(ITEM_TOKEN_PATTERN)].map((match) => match[1].trim());
}
