/**
 * Web Tools
 *
 * Page content goes stale, so web observations carry a TTL.
 */

import { z } from 'zod';
import { ToolRisk } from '../../cognitive/types.js';
import { ToolResult } from '../ToolResult.js';
import { defineTool } from '../ToolRegistry.js';
import type { Tool } from '../types.js';

export const WEB_PAGE_TTL_SECONDS = 7200;
export const WEB_PAGE_MAX_CHARS = 4000;
export const EMPTY_PAGE_CONFIDENCE = 0.3;
export const WEB_FETCH_TIMEOUT_MS = 30_000;

export type FetchLike = (
  url: string,
  init?: { headers?: Record<string, string>; signal?: AbortSignal }
) => Promise<Response>;

/**
 * Simple HTML to text conversion
 */
export function extractTextFromHtml(html: string): string {
  return html
    .replace(/<script[^>]*>[\s\S]*?<\/script>/gi, '')
    .replace(/<style[^>]*>[\s\S]*?<\/style>/gi, '')
    .replace(/<noscript[^>]*>[\s\S]*?<\/noscript>/gi, '')
    .replace(/<[^>]+>/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

export function createReadUrlTool(fetchImpl: FetchLike = fetch, timeoutMs = WEB_FETCH_TIMEOUT_MS): Tool {
  return defineTool({
    name: 'read_url',
    description: 'Fetch a web page and return its readable text.',
    category: 'web',
    riskLevel: ToolRisk.SAFE,
    inputSchema: {
      type: 'object',
      properties: {
        url: { type: 'string', description: 'Absolute http(s) URL' }
      },
      required: ['url']
    },
    argsSchema: z.object({
      url: z.string().url()
    }),
    async execute({ url }) {
      // Covers the body read as well as the request
      const signal = AbortSignal.timeout(timeoutMs);
      let status = 0;
      let statusText = '';
      let html: string | null = null;
      try {
        const response = await fetchImpl(url, {
          headers: { 'User-Agent': 'groundwork-agent/1.0' },
          signal
        });
        status = response.status;
        statusText = response.statusText;
        if (response.ok) {
          html = await response.text();
        }
      } catch (error) {
        if (signal.aborted) {
          return {
            kind: 'with_provenance',
            result: ToolResult.fromError(`Request timed out after ${timeoutMs}ms: ${url}`, 'read_url')
          };
        }
        throw error;
      }

      if (html === null) {
        return {
          kind: 'with_provenance',
          result: ToolResult.fromError(`HTTP ${status}: ${statusText}`, 'read_url')
        };
      }

      let text = extractTextFromHtml(html);
      const truncated = text.length > WEB_PAGE_MAX_CHARS;
      if (truncated) {
        text = `${text.slice(0, WEB_PAGE_MAX_CHARS)}...[truncated]`;
      }

      const fetchedAt = new Date().toISOString();
      if (!text) {
        return {
          kind: 'with_provenance',
          result: ToolResult.fromSuccess('Could not extract any page content', 'read_url', {
            confidence: EMPTY_PAGE_CONFIDENCE,
            ttlSeconds: WEB_PAGE_TTL_SECONDS,
            scope: `url:${url}`,
            metadata: { url, contentLength: 0, fetchedAt }
          })
        };
      }

      return {
        kind: 'with_provenance',
        result: ToolResult.fromSuccess(text, 'read_url', {
          confidence: 1.0,
          ttlSeconds: WEB_PAGE_TTL_SECONDS,
          scope: `url:${url}`,
          metadata: { url, contentLength: text.length, truncated, fetchedAt }
        })
      };
    }
  });
}
