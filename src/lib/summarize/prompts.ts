const COMMENTS_BEGIN = 'COMMENTS BEGIN';
const COMMENTS_END = 'COMMENTS END';
const TITLE_CONTINUATION = 'Title:';
const END_MARKER = 'END';
const PASS_RULE = '============';
const BLOCK_RULE = '======================================';

export const buildInitialPrefix = (title: string, selftext: string): string => `Title: ${title}\n${selftext}`;

export const buildPassPrompt = (prefix: string, instruction: string, chunk: string): string =>
  [prefix, instruction, `${COMMENTS_BEGIN}\n${chunk}\n${COMMENTS_END}`, TITLE_CONTINUATION].join('\n\n');

/** The completion continues the `Title:` line, so the next prefix restates the title. */
export const buildNextPrefix = (title: string, completion: string): string =>
  `${title}\n\n${completion}\n${END_MARKER}`;

export const formatTranscriptHeader = (instruction: string): string => `START\n\n${instruction}\n\n`;

export const formatPassBlock = (index: number, prompt: string, completion: string): string =>
  `\n\n${PASS_RULE}\nSUMMARY COUNT: ${index}\n${PASS_RULE}\n` +
  `PROMPT: ${prompt}\n\n${completion}\n${BLOCK_RULE}\n\n`;
