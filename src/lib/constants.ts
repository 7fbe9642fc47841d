export const VINYL_STATUSES = {
  PENDING: 'pendente',
  PUBLISHED: 'publicado',
  SOLD: 'vendido'
} as const;

export const CATALOG_COLUMNS = [
  '#',
  'Nome',
  'Artista',
  'Ano',
  'Descrição',
  'Condição',
  'Preço',
  'Post Venda',
  'Status',
  'imagem1',
  'imagem2',
  'Data Publicação'
] as const;

export const DEFAULT_SHEET_NAME = 'Página1';
export const DEFAULT_GEMINI_MODEL = 'gemini-2.5-flash';

export const GOOGLE_SCOPES = [
  'https://www.googleapis.com/auth/drive.readonly',
  'https://www.googleapis.com/auth/spreadsheets'
];

export const DRIVE_FILE_URL_PREFIX = 'https://drive.google.com/file/d/';
export const IMAGE_MIME_TYPES = ['image/jpeg', 'image/jpg', 'image/png'];

export const INSTAGRAM_MAX_ALBUM_IMAGES = 10;
export const SALES_POST_MAX_LENGTH = 2000;
export const MAX_LISTED_TRACKS = 10;

export const ANALYSIS_ERROR_NAME = '[Erro na análise]';
export const ANALYSIS_ERROR_ARTIST = '[Verificar manualmente]';

export const ENV_VARS = {
  GOOGLE_SHEETS_ID: 'GOOGLE_SHEETS_ID',
  GOOGLE_DRIVE_FOLDER_ID: 'GOOGLE_DRIVE_FOLDER_ID',
  SHEET_NAME: 'SHEET_NAME',
  GEMINI_API_KEY: 'GEMINI_API_KEY',
  GEMINI_MODEL: 'GEMINI_MODEL',
  INSTAGRAM_USERNAME: 'INSTAGRAM_USERNAME',
  INSTAGRAM_PASSWORD: 'INSTAGRAM_PASSWORD',
  VINYL_BOT_HOME: 'VINYL_BOT_HOME'
} as const;
