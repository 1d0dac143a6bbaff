import {
  formatSiteList,
  sitePlaceholder,
  siteConfigSchema,
  type EnvironmentConfig,
  type SiteConfig,
  type SiteId,
} from '@webgrade/sdk';
import { SiteConfigError } from './errors.js';

export interface RenderOptions {
  /** Throw when no site placeholder matches. Default true. */
  strict?: boolean;
  /** URL index to use instead of each site's `active_url_idx`. */
  urlIdx?: number;
}

export interface DerenderOptions {
  strict?: boolean;
}

function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

/**
 * Resolves `__SITE__` placeholders against configured site URLs, and the reverse.
 */
export class SiteUrls {
  private _environments: Readonly<Record<SiteId, EnvironmentConfig>>;

  constructor(config: SiteConfig) {
    this._environments = config.environments;
  }

  static fromJson(raw: unknown): SiteUrls {
    const parsed = siteConfigSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new SiteConfigError(`Invalid site config at '${issue.path.join('.')}': ${issue.message}`);
    }
    return new SiteUrls(parsed.data);
  }

  get sites(): SiteId[] {
    return Object.keys(this._environments);
  }

  /** URL a site currently resolves to, or null when it has none. */
  activeUrl(site: SiteId): string | null {
    const env = this.environment(site);
    return env.active_url_idx === null ? null : env.urls[env.active_url_idx];
  }

  renderUrl(template: string, sites: readonly SiteId[], options?: RenderOptions): string;
  renderUrl(templates: readonly string[], sites: readonly SiteId[], options?: RenderOptions): string[];
  renderUrl(
    templates: string | readonly string[],
    sites: readonly SiteId[],
    options: RenderOptions = {}
  ): string | string[] {
    this.assertKnown(sites);
    if (typeof templates === 'string') return this.renderOne(templates, sites, options);
    return templates.map((template) => this.renderOne(template, sites, options));
  }

  derenderUrl(url: string, sites: readonly SiteId[], options?: DerenderOptions): string;
  derenderUrl(urls: readonly string[], sites: readonly SiteId[], options?: DerenderOptions): string[];
  derenderUrl(urls: string | readonly string[], sites: readonly SiteId[], options: DerenderOptions = {}): string | string[] {
    this.assertKnown(sites);
    if (typeof urls === 'string') return this.derenderOne(urls, sites, options);
    return urls.map((url) => this.derenderOne(url, sites, options));
  }

  private environment(site: SiteId): EnvironmentConfig {
    const env = this._environments[site];
    if (!env) throw new SiteConfigError(`Sites ${formatSiteList([site])} not found in environments`);
    return env;
  }

  private assertKnown(sites: readonly SiteId[]): void {
    const unknown = sites.filter((site) => !Object.hasOwn(this._environments, site));
    if (unknown.length > 0) {
      throw new SiteConfigError(`Sites ${formatSiteList(unknown)} not found in environments`);
    }
  }

  private renderOne(template: string, sites: readonly SiteId[], options: RenderOptions): string {
    for (const site of sites) {
      const placeholder = sitePlaceholder(site);
      if (!template.includes(placeholder)) continue;
      const env = this.environment(site);
      const index = options.urlIdx ?? env.active_url_idx;
      const baseUrl = index === null ? undefined : env.urls[index];
      if (baseUrl === undefined) {
        throw new SiteConfigError(`Site '${site}' has no URL at index ${index ?? 'none'}`);
      }
      return template.split(placeholder).join(trimTrailingSlash(baseUrl));
    }
    if (options.strict ?? true) {
      throw new SiteConfigError(`No site in ${formatSiteList(sites)} matched template '${template}'`);
    }
    return template;
  }

  private derenderOne(url: string, sites: readonly SiteId[], options: DerenderOptions): string {
    let best: { site: SiteId; baseUrl: string } | null = null;
    for (const site of sites) {
      for (const candidate of this.environment(site).urls) {
        const baseUrl = trimTrailingSlash(candidate);
        const boundary = url.charAt(baseUrl.length);
        const matches = url.startsWith(baseUrl) && (boundary === '' || '/?#'.includes(boundary));
        if (matches && (best === null || baseUrl.length > best.baseUrl.length)) {
          best = { site, baseUrl };
        }
      }
    }
    if (best) return sitePlaceholder(best.site) + url.slice(best.baseUrl.length);
    if (options.strict ?? true) {
      throw new SiteConfigError(
        `URL '${url}' does not match any configured URLs for sites ${formatSiteList(sites)}`
      );
    }
    return url;
  }
}
