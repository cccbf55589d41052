/**
 * Section splitting for full-profile pages.
 *
 * Each `div.title-wrapper` with an h1/h2 heading is a candidate section.
 * Wrappers listing several production kinds (Produções, Orientações) are
 * split at every `div.cita-artigos` header; `div.inst_back` headers name
 * the group the following subsections belong to.
 */

import type { CheerioAPI } from 'cheerio';
import { normalizeLabel, normalizeText } from '../text/normalize';

export interface RawSection {
  title: string;
  group?: string;
  fragment: string;
}

/** Profile sections that never hold productions. */
const NON_PRODUCTION_SECTIONS = [
  'identificacao',
  'endereco',
  'formacao academica',
  'formacao complementar',
  'pos-doutorado',
  'atuacao profissional',
  'areas de atuacao',
  'idiomas',
  'premios e titulos',
];

export function isNonProductionSection(title: string): boolean {
  const label = normalizeLabel(title);
  return NON_PRODUCTION_SECTIONS.some((skip) => label.includes(skip));
}

type DataCellChild =
  | { kind: 'group'; label: string }
  | { kind: 'header'; label: string }
  | { kind: 'content'; html: string };

interface OpenSection {
  title: string;
  group?: string;
  parts: string[];
}

function splitSubsections(wrapperTitle: string, children: DataCellChild[]): RawSection[] {
  const sections: RawSection[] = [];
  let group: string | undefined;
  let current: OpenSection | undefined;

  const flush = () => {
    if (!current) return;
    const section: RawSection = { title: current.title, fragment: current.parts.join('') };
    if (current.group) section.group = current.group;
    sections.push(section);
    current = undefined;
  };

  for (const child of children) {
    switch (child.kind) {
      case 'group':
        flush();
        group = child.label || undefined;
        break;
      case 'header':
        flush();
        current = { title: child.label || wrapperTitle, group, parts: [] };
        break;
      case 'content':
        current?.parts.push(child.html);
        break;
    }
  }
  flush();

  return sections;
}

/**
 * Collect production sections from a full-profile page, in page order.
 */
export function collectProfileSections($: CheerioAPI): RawSection[] {
  const sections: RawSection[] = [];

  $('div.title-wrapper').each((_, wrapper) => {
    const $wrapper = $(wrapper);
    const title = normalizeText($wrapper.find('h1, h2').first().text());
    if (!title || isNonProductionSection(title)) return;

    const children: DataCellChild[] = [];
    $wrapper
      .find('div.data-cell')
      .first()
      .children()
      .each((__, child) => {
        const $child = $(child);
        const groupHeader = $child.is('.inst_back') ? $child : $child.find('.inst_back').first();
        if (groupHeader.length > 0) {
          children.push({ kind: 'group', label: normalizeText(groupHeader.text()) });
          return;
        }
        const header = $child.is('.cita-artigos') ? $child : $child.find('.cita-artigos').first();
        if (header.length > 0) {
          children.push({ kind: 'header', label: normalizeText(header.text()) });
          return;
        }
        children.push({ kind: 'content', html: $.html(child) });
      });

    const subsections = splitSubsections(title, children);
    if (subsections.length > 0) {
      sections.push(...subsections);
    } else {
      sections.push({ title, fragment: $.html(wrapper) });
    }
  });

  return sections;
}
