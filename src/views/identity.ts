import { languageExtension } from "@/shadow/language";

/** Scheme of read-only preview documents handed out by list-style results. */
export const VIRTUAL_SCHEME = "nb";

const SHADOW_INFIX = ".shadow";
const OVERLAY_INFIX = ".cell-";

export const shadowUri = (humanUri: string, language: string): string =>
  `${humanUri}${SHADOW_INFIX}${languageExtension(language)}`;

export const overlayUri = (humanUri: string, cellId: string, language: string): string =>
  `${humanUri}${OVERLAY_INFIX}${cellId}${languageExtension(language)}`;

export const virtualUri = (humanUri: string): string => `${VIRTUAL_SCHEME}:${humanUri}`;

export const isVirtualUri = (uri: string): boolean => uri.startsWith(`${VIRTUAL_SCHEME}:`);

/** Human uri behind a virtual preview uri; undefined for any other uri. */
export const parseVirtualUri = (uri: string): string | undefined =>
  isVirtualUri(uri) ? uri.slice(VIRTUAL_SCHEME.length + 1) : undefined;
