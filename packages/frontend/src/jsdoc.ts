/**
 * JSDoc reading for component attachments
 *
 * A function can override the derived component metadata with tags:
 *
 * ```ts
 * /**
 *  * Adds two numbers.
 *  * @componentName Adder
 *  * @baseImage node:20-alpine
 *  * @componentFile components/adder.yaml
 *  *\/
 * ```
 */

import * as ts from "typescript";
import type { ComponentAttachments } from "./types/component.js";

const TAGS = {
  componentName: "name",
  description: "description",
  baseImage: "baseImage",
  componentFile: "componentFile",
} as const satisfies Record<string, keyof ComponentAttachments>;

type TagName = keyof typeof TAGS;

const isAttachmentTag = (name: string): name is TagName =>
  Object.keys(TAGS).includes(name);

/**
 * The documentation comment text (without tags), or undefined
 */
export const getDocComment = (node: ts.Node): string | undefined => {
  const texts = ts
    .getJSDocCommentsAndTags(node)
    .filter(ts.isJSDoc)
    .map((doc) => ts.getTextOfJSDocComment(doc.comment))
    .filter((text): text is string => text !== undefined && text.length > 0);

  return texts.length > 0 ? texts.join("\n") : undefined;
};

export const getAttachments = (node: ts.Node): ComponentAttachments => {
  const attachments: {
    -readonly [K in keyof ComponentAttachments]: ComponentAttachments[K];
  } = {};

  for (const tag of ts.getJSDocTags(node)) {
    const tagName = tag.tagName.text;
    const value = ts.getTextOfJSDocComment(tag.comment)?.trim();
    if (isAttachmentTag(tagName) && value) {
      attachments[TAGS[tagName]] = value;
    }
  }

  return attachments;
};
