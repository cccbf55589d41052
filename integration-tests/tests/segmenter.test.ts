/**
 * Section segmenter tests
 */

import {
  categorizeSection,
  extractLastUpdate,
  extractSubjectId,
  isNonProductionSection,
  sectionTitleFromFilename,
  segmentDocument,
  SegmentationError,
} from '@curriculo/shared';
import {
  ARTICLE_DOI_HREF,
  ARTICLE_TEXT,
  CHAPTER_TEXT,
  MALFORMED_TEXT,
  itemCells,
  productionWrapper,
  sampleProfilePage,
} from './helpers';

describe('Section Segmenter', () => {
  describe('Full profiles', () => {
    const supervisions = productionWrapper('Orientações', [
      {
        group: 'Orientações e supervisões concluídas',
        header: 'Dissertação de mestrado',
        items: [{ text: 'Maria Souza. Estudo de caso. 2024. Dissertação (Mestrado em Letras) - Universidade Federal de Teste.' }],
      },
    ]);
    const doc = segmentDocument(sampleProfilePage([supervisions]), 'perfil.html');

    it('should read subject metadata', () => {
      expect(doc.subject).toEqual({
        id: '1234567890123456',
        full_name: 'Ana Lúcia Ferreira',
        slug: 'ana-lucia-ferreira',
        last_update: '2025-03-15',
      });
    });

    it('should split wrappers into sections in page order', () => {
      expect(doc.sections.map((section) => [section.title, section.group, section.category])).toEqual([
        ['Artigos completos publicados em periódicos', 'Produção bibliográfica', 'journal_article'],
        ['Capítulos de livros publicados', 'Produção bibliográfica', 'book_chapter'],
        ['Textos em jornais de notícias/revistas', 'Produção bibliográfica', 'press_text'],
        ['Dissertação de mestrado', 'Orientações e supervisões concluídas', 'supervision'],
      ]);
    });

    it('should number items and collect structural hints', () => {
      const [articles, chapters] = doc.sections;

      expect(articles.declaredItemCount).toBe(2);
      expect(articles.items.map((item) => [item.position, item.rawText, item.hints])).toEqual([
        [1, ARTICLE_TEXT, { sortYear: 2024, doiHref: ARTICLE_DOI_HREF }],
        [2, MALFORMED_TEXT, {}],
      ]);
      expect(chapters.items.map((item) => item.rawText)).toEqual([CHAPTER_TEXT]);
    });

    it('should retain sections without items', () => {
      const press = doc.sections[2];
      expect(press.declaredItemCount).toBe(0);
      expect(press.items).toEqual([]);
    });

    it('should skip identification sections', () => {
      expect(doc.sections.some((section) => section.title === 'Identificação')).toBe(false);
      expect(isNonProductionSection('Formação acadêmica/titulação')).toBe(true);
      expect(isNonProductionSection('Produções')).toBe(false);
      expect(doc.warnings).toEqual([]);
    });
  });

  describe('Single-category fixtures', () => {
    it('should take the section from the filename', () => {
      const doc = segmentDocument(
        itemCells([{ text: '   ' }, { text: 'LIMA, D. . Capítulo avulso. In: Obra, 2024.' }]),
        'Capitulos_de_livros_publicados.html'
      );

      expect(doc.subject).toEqual({ id: 'unknown', full_name: 'Unknown Researcher', slug: 'unknown-researcher' });
      expect(doc.sections).toHaveLength(1);
      expect(doc.sections[0].title).toBe('Capitulos de livros publicados');
      expect(doc.sections[0].category).toBe('book_chapter');
      expect(doc.sections[0].declaredItemCount).toBe(2);
      expect(doc.sections[0].items.map((item) => item.position)).toEqual([2]);
      expect(doc.warnings).toEqual(['Capitulos de livros publicados #1: empty item text']);
    });
  });

  describe('Errors', () => {
    it('should reject empty documents', () => {
      expect(() => segmentDocument('  \n ', 'vazio.html')).toThrow(SegmentationError);
    });

    it('should reject pages without sections or item cells', () => {
      expect(() => segmentDocument('<html><body><p>Nada</p></body></html>', 'nada.html')).toThrow(
        'No profile sections or item cells found'
      );
    });
  });

  describe('Subject helpers', () => {
    it('should prefer the filename prefix for the subject id', () => {
      expect(extractSubjectId('9876__nome.html', 'http://lattes.cnpq.br/1234567890123456')).toBe('9876');
      expect(extractSubjectId('nome.html', 'http://lattes.cnpq.br/1234567890123456')).toBe('1234567890123456');
    });

    it('should convert the last update to an ISO date', () => {
      expect(extractLastUpdate('Última atualização do currículo em 01/02/2024')).toBe('2024-02-01');
      expect(extractLastUpdate('sem data')).toBeUndefined();
    });
  });

  describe('Categories', () => {
    it('should map headings to categories', () => {
      expect(categorizeSection('Artigos aceitos para publicação')).toBe('journal_article');
      expect(categorizeSection('Trabalhos completos publicados em anais de congressos')).toBe('event_paper');
      expect(categorizeSection('Mestrado', 'Orientações e supervisões concluídas')).toBe('supervision');
      expect(categorizeSection('Outras produções bibliográficas')).toBe('other');
    });

    it('should derive fixture titles from filenames', () => {
      expect(sectionTitleFromFilename('Textos_em_jornais:revistas.html')).toBe('Textos em jornais revistas');
    });
  });
});
