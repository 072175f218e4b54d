import type { SiteConfig } from "../config/types.js";

function joinUrl(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`;
}

/** URL of the channel directory page */
export function directoryUrl(site: SiteConfig): string {
  return joinUrl(site.baseUrl, site.directoryPath);
}

/** URL of a single channel's page */
export function channelUrl(site: SiteConfig, identifier: string): string {
  return joinUrl(site.baseUrl, site.channelPath.replaceAll("{id}", encodeURIComponent(identifier)));
}
