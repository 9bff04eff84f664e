import { JSDOM } from 'jsdom';

import type { DocumentSnapshot } from './types';

export const toSnapshot = (html: string, url: string, requestedUrl = url): DocumentSnapshot => ({
  url,
  requestedUrl,
  html,
  document: new JSDOM(html, { url }).window.document,
});
