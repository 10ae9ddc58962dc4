import { z } from 'zod';
import categories from '../data/categories.json';
import { VALID_PKG_TYPES } from '../constants';

const ALPHA = /^[A-Za-z0-9+\-_.]+$/;

const CATEGORIES: ReadonlySet<string> = new Set(categories);

const PKG_TYPES: ReadonlySet<string> = new Set<string>(VALID_PKG_TYPES);

const Url = z.string().url();

/** Letters, digits and `+ - _ .` only. */
export function is_valid_alpha(value: string): boolean {
  return ALPHA.test(value);
}

/** Member of the freedesktop.org category vocabulary (case-sensitive). */
export function is_valid_category(value: string): boolean {
  return CATEGORIES.has(value);
}

export function is_valid_pkg_type(value: string): boolean {
  return PKG_TYPES.has(value);
}

/** Absolute http(s) or ftp URL with a host. */
export function is_valid_url(value: string): boolean {
  if (!Url.safeParse(value).success) return false;
  const { protocol, hostname } = new URL(value);
  return ['http:', 'https:', 'ftp:'].includes(protocol) && hostname.length > 0;
}
