import { addCatalogEntry, buildCatalog, parseListingLine } from '../src/catalog-builder';
import { Catalog, countCatalogEntries } from '../src/types';

describe('catalog-builder', () => {
  describe('parseListingLine', () => {
    it('should parse filename, size and timestamp, dropping the sub-second fraction', () => {
      expect(parseListingLine('samtools:1.2--h87a2e9c_2 1024 2024-01-15 10:30:00.123456')).toEqual({
        toolName: 'samtools',
        versionString: '1.2',
        variantString: 'h87a2e9c_2',
        entry: {
          filename: 'samtools:1.2--h87a2e9c_2',
          sizeBytes: 1024,
          modifiedAt: new Date(2024, 0, 15, 10, 30, 0),
        },
      });
    });

    it('should accept extra fields and surrounding whitespace', () => {
      const parsedLine = parseListingLine('  bwa:0.7.17--h5bf99c6_8\t2048   2023-06-23 10:08:04 +0000 extra  ');
      expect(parsedLine?.toolName).toBe('bwa');
      expect(parsedLine?.entry.sizeBytes).toBe(2048);
      expect(parsedLine?.entry.modifiedAt).toEqual(new Date(2023, 5, 23, 10, 8, 4));
    });

    it('should reject lines with fewer than four fields', () => {
      expect(parseListingLine('bad line missing fields')).toBeUndefined();
      expect(parseListingLine('')).toBeUndefined();
    });

    it('should reject lines whose size is not a non-negative integer', () => {
      expect(parseListingLine('samtools:1.2 -5 2024-01-15 10:30:00')).toBeUndefined();
      expect(parseListingLine('samtools:1.2 1.5 2024-01-15 10:30:00')).toBeUndefined();
      expect(parseListingLine('samtools:1.2 big 2024-01-15 10:30:00')).toBeUndefined();
    });

    it('should reject lines with an unparseable timestamp', () => {
      expect(parseListingLine('samtools:1.2 5 2024-13-45 10:30:00')).toBeUndefined();
      expect(parseListingLine('samtools:1.2 5 yesterday 10:30:00')).toBeUndefined();
      expect(parseListingLine('samtools:1.2 5 2024-01-15 noon')).toBeUndefined();
    });

    it('should reject lines whose filename matches no grammar rule', () => {
      expect(parseListingLine('README 5 2024-01-15 10:30:00')).toBeUndefined();
    });
  });

  describe('addCatalogEntry', () => {
    it('should create intermediate levels and replace an existing entry', () => {
      const catalog: Catalog = new Map();
      const firstEntry = { filename: 'x:1.0', sizeBytes: 1, modifiedAt: new Date(2024, 0, 1) };
      const secondEntry = { filename: 'x:1.0', sizeBytes: 2, modifiedAt: new Date(2024, 0, 2) };

      addCatalogEntry(catalog, 'x', '1.0', '', firstEntry);
      addCatalogEntry(catalog, 'x', '1.0', '', secondEntry);

      expect(catalog.get('x')?.get('1.0')?.get('')).toBe(secondEntry);
      expect(countCatalogEntries(catalog)).toBe(1);
    });
  });

  describe('buildCatalog', () => {
    const listingLines = [
      'samtools:1.2 5 2023-06-23 10:08:04',
      'samtools:1.2-0 5 2023-06-23 10:08:04',
      'samtools:1.2.rglab--0 5 2023-06-23 10:08:04',
      'samtools:1.9--h91753b0_8 700 2023-07-01 08:00:00.5',
      'bad line missing fields',
      'README.txt 12 2023-06-23 10:08:04',
      'bwa:0.7.17--h5bf99c6_8 2048 2023-06-24 11:00:00',
    ];

    it('should group entries by tool, version and variant', async () => {
      const catalog = await buildCatalog(listingLines);

      expect([...catalog.keys()]).toEqual(['samtools', 'bwa']);
      expect([...(catalog.get('samtools')?.keys() ?? [])]).toEqual(['1.2', '1.2.rglab', '1.9']);
      expect([...(catalog.get('samtools')?.get('1.2')?.keys() ?? [])]).toEqual(['', '0']);
      expect(catalog.get('samtools')?.get('1.9')?.get('h91753b0_8')).toEqual({
        filename: 'samtools:1.9--h91753b0_8',
        sizeBytes: 700,
        modifiedAt: new Date(2023, 6, 1, 8, 0, 0),
      });
      expect(countCatalogEntries(catalog)).toBe(5);
    });

    it('should consume asynchronous line sources', async () => {
      async function* lines(): AsyncGenerator<string> {
        yield* listingLines;
      }

      const catalog = await buildCatalog(lines());

      expect(countCatalogEntries(catalog)).toBe(5);
    });

    it('should keep the last line when two lines share tool, version and variant', async () => {
      const catalog = await buildCatalog(['x:1.0 1 2024-01-01 00:00:00', 'X:1.0 2 2024-01-02 00:00:00', 'x:1.0 3 2024-01-03 00:00:00']);

      expect(catalog.get('x')?.get('1.0')?.get('')?.sizeBytes).toBe(3);
      expect(catalog.get('X')?.get('1.0')?.get('')?.sizeBytes).toBe(2);
    });

    it('should return an empty catalog for an empty listing', async () => {
      const catalog = await buildCatalog([]);
      expect(catalog.size).toBe(0);
    });
  });
});
