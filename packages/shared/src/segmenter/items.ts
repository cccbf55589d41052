/**
 * Item cells
 *
 * Every numbered `div.layout-cell-1` followed by a `div.layout-cell-11`
 * holding a `span.transform` is one item. Positions are assigned here, in
 * source order, before any field extraction runs.
 */

import * as cheerio from 'cheerio';
import { normalizeText } from '../text/normalize';
import type { ItemBlock, SectionInfo, StructuralHints } from '../types';

const ITEM_NUMBER_PATTERN = /(\d+)/;
const YEAR_PATTERN = /\b((?:19|20)\d{2})\b/;

export interface SectionItems {
  declaredItemCount: number;
  items: ItemBlock[];
  warnings: string[];
}

export function extractSectionItems(fragment: string, section: SectionInfo): SectionItems {
  const $ = cheerio.load(fragment);
  const items: ItemBlock[] = [];
  const warnings: string[] = [];
  let position = 0;

  $('div.layout-cell-1').each((_, cell) => {
    const $cell = $(cell);
    if (!ITEM_NUMBER_PATTERN.test($cell.find('b').first().text())) return;

    position++;

    const $content = $cell.next();
    if (!$content.is('div.layout-cell-11')) {
      warnings.push(`${section.title} #${position}: item cell without content cell`);
      return;
    }

    const $span = $content.find('span.transform').first();
    if ($span.length === 0) {
      warnings.push(`${section.title} #${position}: content cell without text block`);
      return;
    }

    $span.find('br').replaceWith(' ');
    const rawText = normalizeText($span.text());
    if (!rawText) {
      warnings.push(`${section.title} #${position}: empty item text`);
      return;
    }

    // Journal articles wrap both cells in div.artigo-completo, which also
    // carries the hidden sort attributes.
    const $wrapper = $cell.parent('div.artigo-completo');
    const $scope = $wrapper.length > 0 ? $wrapper : $content;

    const hints: StructuralHints = {};
    const doiHref = $scope.find('a.icone-doi').first().attr('href');
    if (doiHref) hints.doiHref = doiHref.trim();

    const sortYear = $scope.find('span[data-tipo-ordenacao="ano"]').first().text().match(YEAR_PATTERN);
    if (sortYear) hints.sortYear = parseInt(sortYear[1], 10);

    items.push({ position, rawText, hints, section });
  });

  return { declaredItemCount: position, items, warnings };
}
