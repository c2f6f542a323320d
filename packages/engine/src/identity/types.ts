import { z } from 'zod';

const browserFamilySchema = z.enum(['chrome', 'edge', 'firefox', 'safari']);
const platformSchema = z.enum(['Windows', 'macOS', 'Linux', 'Android', 'iOS']);

const viewportSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
});

const identityCatalogSchema = z.object({
  version: z.number().int().positive(),
  userAgents: z
    .array(
      z.object({
        userAgent: z.string().min(1),
        family: browserFamilySchema,
        platform: platformSchema,
        mobile: z.boolean(),
      }),
    )
    .min(1),
  viewports: z.object({
    desktop: z.array(viewportSchema).min(1),
    mobile: z.array(viewportSchema).min(1),
  }),
  locales: z
    .array(
      z.object({
        locale: z.string().min(2),
        languages: z.array(z.string().min(2)).min(1),
        acceptLanguage: z.string().min(2),
      }),
    )
    .min(1),
  timezones: z.array(z.string().min(1)).min(1),
  hardware: z.object({
    colorDepth: z.array(z.number().int().positive()).min(1),
    deviceMemory: z.array(z.number().positive()).min(1),
    hardwareConcurrency: z.array(z.number().int().positive()).min(1),
  }),
});

type BrowserFamily = z.infer<typeof browserFamilySchema>;
type Platform = z.infer<typeof platformSchema>;
type Viewport = z.infer<typeof viewportSchema>;
type IdentityCatalog = z.infer<typeof identityCatalogSchema>;
type UserAgentEntry = IdentityCatalog['userAgents'][number];

/** What one session presents to the target. Frozen once issued. */
type Identity = Readonly<{
  userAgent: string;
  family: BrowserFamily;
  platform: Platform;
  mobile: boolean;
  headers: Readonly<Record<string, string>>;
  viewport: Readonly<Viewport>;
  locale: string;
  languages: readonly string[];
  timezone: string;
  colorDepth: number;
  deviceMemory: number;
  hardwareConcurrency: number;
}>;

export { identityCatalogSchema };
export type { BrowserFamily, Identity, IdentityCatalog, Platform, UserAgentEntry, Viewport };
