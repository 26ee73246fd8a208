/**
 * Prompt template handling.
 *
 * A template carries an `<Input>` section with a `<UserInput>` tag. The topic
 * replaces the content of that tag; `<UserInput>` tags elsewhere (examples)
 * are left alone.
 */

import { readFile } from 'node:fs/promises';
import { InvalidTemplateError } from '../types/pipeline-error.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('prompt-template');

const INPUT_OPEN = '<Input>';
const INPUT_CLOSE = '</Input>';
const USER_INPUT_OPEN = '<UserInput>';
const USER_INPUT_CLOSE = '</UserInput>';

/**
 * Read a template file.
 */
export async function loadTemplate(path: string): Promise<string> {
  let template: string;
  try {
    template = await readFile(path, 'utf-8');
  } catch (error) {
    throw new InvalidTemplateError(`Cannot read prompt template at ${path}`, { cause: error });
  }
  log.debug({ path, length: template.length }, 'Template loaded');
  return template;
}

/**
 * Put the topic into the first `<UserInput>` of the first `<Input>` section.
 */
export function injectTopic(template: string, topic: string): string {
  const inputStart = template.indexOf(INPUT_OPEN);
  if (inputStart === -1) {
    throw new InvalidTemplateError(`Template has no ${INPUT_OPEN} section`);
  }
  const inputEnd = template.indexOf(INPUT_CLOSE, inputStart);
  if (inputEnd === -1) {
    throw new InvalidTemplateError(`Template has no ${INPUT_CLOSE} tag`);
  }

  const section = template.slice(inputStart, inputEnd);
  const tagStart = section.indexOf(USER_INPUT_OPEN);
  if (tagStart === -1) {
    throw new InvalidTemplateError(`Template has no ${USER_INPUT_OPEN} tag inside ${INPUT_OPEN}`);
  }
  const tagEnd = section.indexOf(USER_INPUT_CLOSE, tagStart);
  if (tagEnd === -1) {
    throw new InvalidTemplateError(`Template has no ${USER_INPUT_CLOSE} tag inside ${INPUT_OPEN}`);
  }

  const contentStart = inputStart + tagStart + USER_INPUT_OPEN.length;
  const contentEnd = inputStart + tagEnd;
  return template.slice(0, contentStart) + topic + template.slice(contentEnd);
}

/**
 * Check a template without producing a prompt.
 */
export function validateTemplate(template: string): void {
  injectTopic(template, '');
}
