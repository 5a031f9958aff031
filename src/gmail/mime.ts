import type { gmail_v1 } from 'googleapis';
import { DecodeError } from '../util/errors.js';

export type LeafPart = {
  kind: 'leaf';
  mimeType: string;
  /** base64url payload; null when the body lives elsewhere (attachments). */
  data: string | null;
};

export type ContainerPart = {
  kind: 'container';
  mimeType: string;
  parts: BodyPart[];
};

export type BodyPart = LeafPart | ContainerPart;

export type ExtractedBodies = {
  plainText: string;
  htmlText: string;
};

export const MAX_PART_DEPTH = 16;

const BASE64_ALPHABET = /^[A-Za-z0-9\-_+/]*={0,2}$/;

export function toBodyPart(part: gmail_v1.Schema$MessagePart | null | undefined, depth = 0): BodyPart {
  const mimeType = part?.mimeType ?? '';
  const children = (part?.parts ?? []).filter(
    (child: gmail_v1.Schema$MessagePart | null | undefined): child is gmail_v1.Schema$MessagePart => Boolean(child)
  );
  if (children.length && depth < MAX_PART_DEPTH) {
    return {
      kind: 'container',
      mimeType,
      parts: children.map(child => toBodyPart(child, depth + 1))
    };
  }
  if (children.length) {
    return { kind: 'container', mimeType, parts: [] };
  }
  return { kind: 'leaf', mimeType, data: part?.body?.data ?? null };
}

export function decodeBase64Url(data: string): string {
  const compact = data.replace(/\s+/g, '');
  if (!BASE64_ALPHABET.test(compact)) {
    throw new DecodeError('payload contains characters outside the base64url alphabet');
  }
  if (compact.replace(/=+$/, '').length % 4 === 1) {
    throw new DecodeError('payload has an impossible base64 length');
  }
  const normalized = compact.replace(/-/g, '+').replace(/_/g, '/');
  // TextDecoder substitutes U+FFFD for malformed UTF-8 instead of throwing.
  return new TextDecoder('utf-8').decode(Buffer.from(normalized, 'base64'));
}

function decodeLeaf(leaf: LeafPart): string {
  if (!leaf.data) return '';
  try {
    return decodeBase64Url(leaf.data);
  } catch (err) {
    if (err instanceof DecodeError) return '';
    throw err;
  }
}

/**
 * Walks the part tree depth-first and concatenates every text/plain and
 * text/html leaf in traversal order. Other leaf types are ignored.
 */
export function extractBodies(tree: BodyPart): ExtractedBodies {
  const plain: string[] = [];
  const html: string[] = [];

  function walk(part: BodyPart, depth: number) {
    if (depth > MAX_PART_DEPTH) return;
    if (part.kind === 'container') {
      for (const child of part.parts) walk(child, depth + 1);
      return;
    }
    if (part.mimeType === 'text/plain') plain.push(decodeLeaf(part));
    else if (part.mimeType === 'text/html') html.push(decodeLeaf(part));
  }

  walk(tree, 0);
  return { plainText: plain.join(''), htmlText: html.join('') };
}
