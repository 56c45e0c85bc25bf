import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { ScrapingConfig, WebsiteConfig } from './types';

const FieldSelectorsSchema = z.object({
  row: z.string().min(1),
  issuer: z.string().min(1),
  title: z.string().min(1),
  cashPrize: z.string().min(1),
  entryFee: z.string().min(1),
  deadline: z.string().min(1),
  genres: z.string().min(1),
  description: z.string().min(1),
  readMoreLink: z.string().min(1),
  extraInfo: z.string().min(1).optional(),
});

const WebsiteConfigSchema = z.object({
  name: z.string().min(1),
  listingUrl: z.string().url(),
  baseOrigin: z.string().url(),
  selectors: FieldSelectorsSchema,
});

const ScrapingConfigSchema = z.object({
  websites: z.array(WebsiteConfigSchema),
});

export class ConfigLoader {
  private static configPath = path.join(__dirname, '../../config');

  static loadWebsitesConfig(configDir: string = ConfigLoader.configPath): ScrapingConfig {
    const configPath = path.join(configDir, 'websites.json');
    const raw: unknown = JSON.parse(fs.readFileSync(configPath, 'utf8'));
    const parsed = ScrapingConfigSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map(issue => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new Error(`Invalid website configuration in ${configPath}: ${issues}`);
    }
    return parsed.data;
  }

  static getWebsiteConfig(websiteName: string, configDir?: string): WebsiteConfig {
    const config = this.loadWebsitesConfig(configDir);
    const website = config.websites.find(w => w.name === websiteName);
    if (!website) {
      const known = config.websites.map(w => w.name).join(', ');
      throw new Error(`Unknown website: ${websiteName} (configured: ${known})`);
    }
    return website;
  }
}
