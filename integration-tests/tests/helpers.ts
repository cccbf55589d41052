/**
 * Test Helpers
 *
 * Builders for profile-page fixtures in the exported markup, and temporary
 * directories for batch runs.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { ItemBlock, ProductionCategory, StructuralHints } from '@curriculo/shared';

export const SCHEMA_PATH = path.join(__dirname, '../../docs/contracts/researcher_output.schema.json');

export const FIXED_TIME = '2025-01-15T12:00:00.000Z';

export const fixedClock = (): Date => new Date(FIXED_TIME);

export interface FixtureItem {
  text: string;
  /** Year published in the hidden sort attribute */
  sortYear?: number;
  doiHref?: string;
}

export interface FixtureBlock {
  group?: string;
  header: string;
  items: FixtureItem[];
  /** Wrap each item in div.artigo-completo, as journal articles are */
  articles?: boolean;
}

function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/**
 * Numbered item cells: div.layout-cell-1 followed by div.layout-cell-11.
 */
export function itemCells(items: FixtureItem[], articles = false): string {
  return items
    .map((item, index) => {
      const hidden = [
        item.sortYear !== undefined ? `<span data-tipo-ordenacao="ano">${item.sortYear}</span>` : '',
        item.doiHref ? `<a class="icone-doi" href="${item.doiHref}" target="_blank"></a>` : '',
      ].join('');
      const cells =
        `<div class="layout-cell layout-cell-1 text-align-right"><div class="layout-cell-pad-5 text-align-right"><b>${index + 1}.</b></div></div>` +
        `<div class="layout-cell layout-cell-11"><div class="layout-cell-pad-5">${hidden}<span class="transform">${escapeHtml(item.text)}</span></div></div>`;
      return articles ? `<div class="artigo-completo">${cells}</div>` : cells;
    })
    .join('\n');
}

/**
 * A title-wrapper split into subsections by cita-artigos headers.
 */
export function productionWrapper(title: string, blocks: FixtureBlock[]): string {
  const body = blocks
    .map((block) =>
      [
        block.group ? `<div class="inst_back"><b>${block.group}</b></div>` : '',
        `<div class="cita-artigos"><b>${block.header}</b></div>`,
        itemCells(block.items, block.articles),
      ].join('\n')
    )
    .join('\n');

  return `<div class="title-wrapper"><h1>${title}</h1><div class="layout-cell layout-cell-12 data-cell">\n${body}\n</div></div>`;
}

export interface ProfileOptions {
  name?: string;
  profileId?: string;
  lastUpdate?: string;
  wrappers: string[];
}

/**
 * A full-profile page with the identification block and the given wrappers.
 */
export function profilePage(options: ProfileOptions): string {
  const name = options.name
    ? `<h2 class="nome">${options.name}<br><span class="texto">Bolsista de Produtividade em Pesquisa</span></h2>`
    : '';
  const info = [
    options.profileId ? `<li>Endereço para acessar este CV: http://lattes.cnpq.br/${options.profileId}</li>` : '',
    options.lastUpdate ? `<li>Última atualização do currículo em ${options.lastUpdate}</li>` : '',
  ].join('');

  return [
    '<!DOCTYPE html>',
    '<html><head><meta http-equiv="Content-Type" content="text/html; charset=iso-8859-1"><title>Currículo</title></head>',
    '<body>',
    `<div class="infpessoa">${name}<ul class="informacoes-autor">${info}</ul></div>`,
    '<div class="title-wrapper"><h1>Identificação</h1><div class="layout-cell layout-cell-12 data-cell"><p>Nome em citações bibliográficas</p></div></div>',
    ...options.wrappers,
    '</body></html>',
  ].join('\n');
}

/**
 * An item block as the segmenter would hand it to an extractor.
 */
export function makeItem(
  rawText: string,
  category: ProductionCategory,
  sectionTitle: string,
  options: { position?: number; hints?: StructuralHints; group?: string } = {}
): ItemBlock {
  const section = options.group
    ? { title: sectionTitle, group: options.group, category }
    : { title: sectionTitle, category };
  return { position: options.position ?? 1, rawText, hints: options.hints ?? {}, section };
}

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `curriculo-${prefix}-`));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export const ARTICLE_TEXT =
  'FERREIRA, A. L.; SOUZA, C. . Leitura e escrita na escola. Revista Brasileira de Testes, v. 12, n. 3, p. 45-67, 2024.';
export const ARTICLE_DOI_HREF = 'https://doi.org/10.1234/rbt.2024.001';
export const MALFORMED_TEXT = 'Resumo sem estrutura publicado em 2025';
export const CHAPTER_TEXT =
  'FERREIRA, A. L. . Capítulo de teste. In: SOUZA, C. (Org.). Livro de Exemplo. 2ed.São Paulo: Editora Teste, 2024, v. 1, p. 10-20.';

/**
 * A small researcher profile: two articles, one chapter and an empty press
 * section under "Produções".
 */
export function sampleProfilePage(extraWrappers: string[] = []): string {
  return profilePage({
    name: 'Ana Lúcia Ferreira',
    profileId: '1234567890123456',
    lastUpdate: '15/03/2025',
    wrappers: [
      productionWrapper('Produções', [
        {
          group: 'Produção bibliográfica',
          header: 'Artigos completos publicados em periódicos',
          articles: true,
          items: [{ text: ARTICLE_TEXT, sortYear: 2024, doiHref: ARTICLE_DOI_HREF }, { text: MALFORMED_TEXT }],
        },
        { header: 'Capítulos de livros publicados', items: [{ text: CHAPTER_TEXT }] },
        { header: 'Textos em jornais de notícias/revistas', items: [] },
      ]),
      ...extraWrappers,
    ],
  });
}
