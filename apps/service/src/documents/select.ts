import { ElementType } from 'domelementtype';
import type { AnyNode, Element } from 'domhandler';

import type { DocumentFetcher, LoadedDocument } from './fetcher.js';

const isElementNode = (node: AnyNode): node is Element => node.type === ElementType.Tag;

const normalizeText = (value: string): string => value.replace(/\s+/g, ' ').trim();

export const select = (document: LoadedDocument, selector: string): Element[] =>
  document.$(selector).toArray().filter(isElementNode);

export const selectOne = (document: LoadedDocument, selector: string): Element | undefined =>
  select(document, selector)[0];

export interface SelectorProbeMatch {
  readonly tag: string;
  readonly id: string | null;
  readonly classes: readonly string[];
  /** First 200 characters of the whitespace-collapsed text. */
  readonly text: string;
  readonly textLength: number;
  readonly attributeValue?: string | null;
}

export interface SelectorProbeReport {
  readonly url: string;
  readonly selector: string;
  readonly totalMatches: number;
  readonly first: SelectorProbeMatch | null;
  /** Text of the first three matches, only reported when several elements match. */
  readonly samples: readonly string[];
}

export interface SelectorProbeFailure {
  readonly url: string;
  readonly selector: string;
  readonly error: string;
}

export type SelectorProbeResult = SelectorProbeReport | SelectorProbeFailure;

export interface ProbeSelectorInput {
  readonly url: string;
  readonly selector: string;
  /** Attribute to report instead of text content. */
  readonly attribute?: string;
}

const describeMatch = (document: LoadedDocument, element: Element, attribute: string | undefined): SelectorProbeMatch => {
  const text = normalizeText(document.$(element).text());
  const match: SelectorProbeMatch = {
    tag: element.name,
    id: element.attribs.id ?? null,
    classes: (element.attribs.class ?? '').split(/\s+/).filter(Boolean),
    text: text.slice(0, 200),
    textLength: text.length
  };
  return attribute ? { ...match, attributeValue: element.attribs[attribute] ?? null } : match;
};

/** Fetches `url` and reports what `selector` matches there. */
export const probeSelector = async (
  fetcher: DocumentFetcher,
  input: ProbeSelectorInput
): Promise<SelectorProbeResult> => {
  const { url, selector } = input;
  const outcome = await fetcher.fetch(url);
  if (outcome.document === null) {
    return { url, selector, error: outcome.error };
  }

  const { document } = outcome;
  let elements: Element[];
  try {
    elements = select(document, selector);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { url, selector, error: `Error testing selector: ${message}` };
  }

  const attribute = input.attribute?.trim() || undefined;
  const [first] = elements;
  return {
    url,
    selector,
    totalMatches: elements.length,
    first: first ? describeMatch(document, first, attribute) : null,
    samples:
      elements.length > 1
        ? elements.slice(0, 3).map((element) => normalizeText(document.$(element).text()).slice(0, 100))
        : []
  };
};
