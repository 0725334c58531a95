import fs from 'node:fs/promises';
import JSON5 from 'json5';
import { z } from 'zod';
import type { LanguageCode } from '../../shared/types';

export const REGIONS = ['india', 'gujarat', 'international'] as const;
export type Region = (typeof REGIONS)[number];

const ScrapePageSchema = z.object({
  name: z.string().min(1),
  label: z.string().min(1),
  url: z.string().url(),
  selector: z.string().min(1),
  language: z.enum(['en', 'hi', 'gu']),
  regions: z.array(z.enum(REGIONS)).min(1),
});

export const ScrapeCatalogSchema = z
  .object({
    pages: z.array(ScrapePageSchema),
  })
  .superRefine((catalog, ctx) => {
    const seen = new Set<string>();
    catalog.pages.forEach((page, index) => {
      if (seen.has(page.name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['pages', index, 'name'], message: `duplicate page "${page.name}"` });
      }
      seen.add(page.name);
    });
  });

export type ScrapePage = z.infer<typeof ScrapePageSchema>;
export type ScrapeCatalog = z.infer<typeof ScrapeCatalogSchema>;

export interface CatalogSelection {
  region?: Region;
  language?: LanguageCode;
}

export const loadScrapeCatalog = async (catalogPath: string): Promise<ScrapeCatalog> =>
  ScrapeCatalogSchema.parse(JSON5.parse(await fs.readFile(catalogPath, 'utf-8')));

/**
 * Pages for a region (default: India and Gujarat). English pages are always eligible; a Hindi or
 * Gujarati request adds that language's pages ahead of them.
 */
export const selectPages = (catalog: ScrapeCatalog, selection: CatalogSelection = {}): ScrapePage[] => {
  const regions: Region[] = selection.region ? [selection.region] : ['india', 'gujarat'];
  const language = selection.language ?? 'en';
  const inRegion = catalog.pages.filter((page) => page.regions.some((region) => regions.includes(region)));

  const localized = language === 'hi' || language === 'gu' ? inRegion.filter((page) => page.language === language) : [];
  const english = inRegion.filter((page) => page.language === 'en');
  return [...localized, ...english];
};

export const isRegion = (value: unknown): value is Region =>
  typeof value === 'string' && REGIONS.some((region) => region === value);
