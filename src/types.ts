export interface Message {
  id: string;
  role: 'user' | 'assistant';
  content: string;
  timestamp: number;
}

export type UrlSourceType = 'Website' | 'Youtube';
export type FileSourceType = 'Pdf' | 'Csv' | 'Txt';
export type SourceType = UrlSourceType | FileSourceType;

export const SOURCE_TYPES: readonly SourceType[] = ['Website', 'Youtube', 'Pdf', 'Csv', 'Txt'];

export function isSourceType(value: string): value is SourceType {
  return SOURCE_TYPES.some((type) => type === value);
}

export function isUrlSourceType(type: SourceType): type is UrlSourceType {
  return type === 'Website' || type === 'Youtube';
}

export type DocumentSource =
  | { type: UrlSourceType; url: string }
  | { type: FileSourceType; file: Blob };

export type ProviderName = 'Groq' | 'OpenAI';
