/**
 * Scheme Builder
 *
 * Turns parsed scheme entries into a Scheme. Loading is best effort: each
 * failing line is skipped with a diagnostic and the rest still load.
 */

import {
  DefinitionError,
  ExpressionError,
  isAppError,
  MalformedSchemeEntryError,
  UnknownItemError,
} from "@/lib/errors";
import { createLogger } from "@/lib/logger";

import { expressionEvaluator } from "../rule-engine/expression-evaluator";
import { createRule } from "../rule-engine/rule";
import { COUPON_ID_PREFIX, createCoupon, createProduct, type Item, type Rule } from "../rule-engine/types";
import { Scheme } from "./scheme";
import { parseSchemeSource } from "./scheme-parser";
import type { SchemeDiagnostic, SchemeEntry } from "./types";

const logger = createLogger("scheme-builder");

export interface SchemeBuildResult {
  scheme: Scheme;
  diagnostics: SchemeDiagnostic[];
}

export class SchemeBuilder {
  private readonly items = new Map<string, Item>();
  private readonly rules = new Map<string, Rule>();

  /**
   * Define an item. Ids starting with "C" are coupons.
   */
  addItem(id: string, expression: string): Item {
    if (this.items.has(id)) {
      throw new DefinitionError(`Duplicate item id: ${id}`);
    }

    const value = this.evaluate(expression);
    const item = id.startsWith(COUPON_ID_PREFIX) ? createCoupon(id, value) : createProduct(id, value);
    this.items.set(id, item);
    return item;
  }

  /**
   * Define a rule over items that are already defined
   */
  addRule(name: string, itemIds: readonly string[], expression: string): Rule {
    if (this.rules.has(name)) {
      throw new DefinitionError(`Duplicate rule name: ${name}`);
    }

    const requiredItems = itemIds.map((id) => this.requireItem(id));
    const rule = createRule(name, requiredItems, this.evaluate(expression));
    this.rules.set(name, rule);
    return rule;
  }

  addEntry(entry: SchemeEntry): void {
    switch (entry.type) {
      case "SKIP":
        return;
      case "ITEM":
        this.addItem(entry.id, entry.expression);
        return;
      case "RULE":
        this.addRule(entry.name, entry.itemIds, entry.expression);
        return;
    }
  }

  build(): Scheme {
    return new Scheme([...this.items.values()], [...this.rules.values()]);
  }

  private requireItem(id: string): Item {
    const item = this.items.get(id);
    if (!item) {
      throw new UnknownItemError(id);
    }
    return item;
  }

  private evaluate(expression: string): number {
    try {
      return expressionEvaluator.evaluateWithReferences(
        expression,
        (id) => this.requireItem(id).nominalValue
      );
    } catch (error) {
      if (error instanceof ExpressionError) {
        throw new MalformedSchemeEntryError(error.message, { cause: error });
      }
      throw error;
    }
  }
}

/**
 * Build a scheme from source text, skipping lines that fail
 */
export function buildScheme(source: string): SchemeBuildResult {
  const builder = new SchemeBuilder();
  const diagnostics: SchemeDiagnostic[] = [];

  for (const parsed of parseSchemeSource(source)) {
    try {
      if ("error" in parsed) {
        throw parsed.error;
      }
      builder.addEntry(parsed.entry);
    } catch (error) {
      if (!isAppError(error)) {
        throw error;
      }

      const diagnostic: SchemeDiagnostic = {
        line: parsed.line,
        code: error.code,
        message: error.message,
        text: parsed.text.trim(),
      };
      diagnostics.push(diagnostic);
      logger.warn("Skipped scheme entry", { ...diagnostic });
    }
  }

  const scheme = builder.build();
  logger.debug("Scheme built", {
    items: scheme.items.length,
    rules: scheme.rules.length,
    skipped: diagnostics.length,
  });

  return { scheme, diagnostics };
}
