import { XMLParser, XMLValidator } from "fast-xml-parser";
import { DocumentParseError } from "../../errors.js";
import type { ClinicalCode } from "../../terminology/types.js";
import { sanitizeDisplay } from "../../validation/section-validator.js";

export type XmlValue = string | XmlElement | XmlValue[];

export interface XmlElement {
  [name: string]: XmlValue | undefined;
}

const TEXT = "#text";

// every element is an array, attributes stay plain strings
const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  removeNSPrefix: true,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
  textNodeName: TEXT,
  isArray: (_name, _jpath, _isLeafNode, isAttribute) => !isAttribute,
});

export interface CdaDocument {
  root: XmlElement;
  documentId: string | null;
}

export interface CdaSection {
  element: XmlElement;
  code: string | null;
  templateIds: string[];
  /** Narrative fragments keyed by their ID attribute, for originalText references. */
  narrative: ReadonlyMap<string, string>;
}

export interface SectionMatch {
  templateIds: readonly string[];
  codes: readonly string[];
}

function asElement(value: XmlValue): XmlElement | null {
  if (typeof value === "string") return { [TEXT]: value };
  return isRecord(value) ? value : null;
}

export function children(element: XmlElement | null | undefined, name: string): XmlElement[] {
  if (!element) return [];
  const value = element[name];
  if (value === undefined) return [];
  const items = Array.isArray(value) ? value : [value];
  const result: XmlElement[] = [];
  for (const item of items) {
    const child = asElement(item);
    if (child) result.push(child);
  }
  return result;
}

export function child(element: XmlElement | null | undefined, name: string): XmlElement | null {
  return children(element, name)[0] ?? null;
}

/** Follows a path of element names, taking the first match at each step. */
export function path(element: XmlElement | null | undefined, ...names: string[]): XmlElement | null {
  let current: XmlElement | null = element ?? null;
  for (const name of names) {
    current = child(current, name);
    if (!current) return null;
  }
  return current;
}

export function attr(element: XmlElement | null | undefined, name: string): string | null {
  const value = element?.[`@_${name}`];
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

/** All text below an element, document order within each element. */
export function textContent(element: XmlElement | null | undefined): string {
  if (!element) return "";
  const parts: string[] = [];
  for (const [key, value] of Object.entries(element)) {
    if (key.startsWith("@_") || value === undefined) continue;
    if (key === TEXT) {
      parts.push(typeof value === "string" ? value : "");
      continue;
    }
    for (const node of children(element, key)) {
      parts.push(textContent(node));
    }
  }
  return sanitizeDisplay(parts.join(" "));
}

export function parseCdaDocument(xml: string): CdaDocument {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw new DocumentParseError("CDA", `${validation.err.msg} (line ${validation.err.line})`);
  }

  let parsed: unknown;
  try {
    parsed = parser.parse(xml);
  } catch (err) {
    throw new DocumentParseError("CDA", "XML could not be parsed", err);
  }

  const rootValue = isRecord(parsed) ? parsed["ClinicalDocument"] : undefined;
  const root: unknown = Array.isArray(rootValue) ? rootValue[0] : rootValue;
  if (!isRecord(root)) {
    throw new DocumentParseError("CDA", "root element is not ClinicalDocument");
  }

  return { root, documentId: readIdentifier(child(root, "id")) };
}

// parser output is always elements, arrays and strings
function isRecord(value: unknown): value is XmlElement {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function collectNarrative(element: XmlElement | null, into: Map<string, string>): void {
  if (!element) return;
  const id = attr(element, "ID");
  if (id) into.set(id, textContent(element));
  for (const [key] of Object.entries(element)) {
    if (key.startsWith("@_") || key === TEXT) continue;
    for (const node of children(element, key)) {
      collectNarrative(node, into);
    }
  }
}

function toSection(element: XmlElement): CdaSection {
  const narrative = new Map<string, string>();
  collectNarrative(child(element, "text"), narrative);
  return {
    element,
    code: attr(child(element, "code"), "code"),
    templateIds: children(element, "templateId")
      .map((template) => attr(template, "root"))
      .filter((root): root is string => root !== null),
    narrative,
  };
}

function sectionsBelow(container: XmlElement | null): XmlElement[] {
  return children(container, "component").flatMap((component) => children(component, "section"));
}

/**
 * Every section, nested ones included, whose templateId or LOINC code
 * matches. Document order.
 */
export function findSections(document: CdaDocument, match: SectionMatch): CdaSection[] {
  const found: CdaSection[] = [];
  const visit = (sections: XmlElement[]): void => {
    for (const element of sections) {
      const section = toSection(element);
      const byTemplate = section.templateIds.some((id) => match.templateIds.includes(id));
      const byCode = section.code !== null && match.codes.includes(section.code);
      if (byTemplate || byCode) found.push(section);
      visit(sectionsBelow(element));
    }
  };
  visit(sectionsBelow(path(document.root, "component", "structuredBody")));
  return found;
}

/** `root/extension`, or just root; null when the element has neither. */
export function readIdentifier(id: XmlElement | null): string | null {
  const root = attr(id, "root");
  const extension = attr(id, "extension");
  if (root && extension) return `${root}/${extension}`;
  return root ?? extension;
}

export function entryReference(id: string): string {
  return `ClinicalDocument#${id}`;
}

export function readOriginalText(element: XmlElement | null, section: CdaSection | null): string | null {
  const originalText = child(element, "originalText");
  if (!originalText) return null;

  const reference = attr(child(originalText, "reference"), "value");
  if (reference && section) {
    const referenced = section.narrative.get(reference.replace(/^#/, ""));
    if (referenced) return referenced;
  }

  const inline = textContent(originalText);
  return inline.length > 0 ? inline : null;
}

function codeFrom(element: XmlElement, sourceDisplay: string | null): ClinicalCode | null {
  const code = attr(element, "code");
  if (!code) return null;
  return {
    code,
    codeSystemOid: attr(element, "codeSystem") ?? "",
    sourceDisplay,
  };
}

/**
 * Reads a CD/CE element. The source display is displayName, else the
 * referenced narrative text, else inline originalText. Null for nullFlavor
 * or uncoded elements.
 */
export function readCode(element: XmlElement | null, section: CdaSection | null): ClinicalCode | null {
  if (!element || attr(element, "nullFlavor")) return null;
  return codeFrom(element, attr(element, "displayName") ?? readOriginalText(element, section));
}

export function readTranslations(element: XmlElement | null): ClinicalCode[] {
  return children(element, "translation")
    .map((translation) => codeFrom(translation, attr(translation, "displayName")))
    .filter((code): code is ClinicalCode => code !== null);
}

const TS_PATTERN = /^(\d{4})(\d{2})?(\d{2})?(?:(\d{2})(\d{2})(\d{2})?(?:\.\d+)?)?([+-]\d{4})?$/;

/**
 * HL7 TS (`YYYY[MM[DD[HHMM[SS]]]][+ZZZZ]`) to an ISO 8601 string with the
 * same precision. Null when the value does not parse.
 */
export function readTimestamp(value: string | null): string | null {
  if (!value) return null;
  const match = TS_PATTERN.exec(value.trim());
  if (!match) return null;
  const [, year, month, day, hour, minute, second, zone] = match;
  if (!year) return null;
  if (month && (Number(month) < 1 || Number(month) > 12)) return null;
  if (day && (Number(day) < 1 || Number(day) > 31)) return null;

  if (!month) return year;
  if (!day) return `${year}-${month}`;
  if (!hour || !minute) return `${year}-${month}-${day}`;

  const offset = zone ? `${zone.slice(0, 3)}:${zone.slice(3)}` : "";
  return `${year}-${month}-${day}T${hour}:${minute}:${second ?? "00"}${offset}`;
}

/** effectiveTime/@value, else effectiveTime/low/@value. */
export function readEffectiveTime(element: XmlElement | null): string | null {
  const effectiveTime = child(element, "effectiveTime");
  return readTimestamp(attr(effectiveTime, "value") ?? attr(child(effectiveTime, "low"), "value"));
}

/** Entry-level clinical statements of a section (act, observation, ...). */
export function sectionEntries(section: CdaSection, statement: string): XmlElement[] {
  return children(section.element, "entry").flatMap((entry) => children(entry, statement));
}

/** Clinical statements nested through entryRelationship. */
export function related(element: XmlElement | null, statement: string, typeCode?: string): XmlElement[] {
  return children(element, "entryRelationship")
    .filter((relationship) => !typeCode || attr(relationship, "typeCode") === typeCode)
    .flatMap((relationship) => children(relationship, statement));
}

/** First nested observation whose own `code/@code` is one of `codes`. */
export function relatedObservation(element: XmlElement | null, ...codes: string[]): XmlElement | null {
  return related(element, "observation").find((observation) => {
    const code = attr(child(observation, "code"), "code");
    return code !== null && codes.includes(code);
  }) ?? null;
}

/** Coded `value` of the nested observation with the given code. */
export function relatedValueCode(element: XmlElement | null, ...codes: string[]): string | null {
  return attr(child(relatedObservation(element, ...codes), "value"), "code");
}
