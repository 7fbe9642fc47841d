import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import path from 'path';
import { GoogleGenAI, type Part } from '@google/genai';
import { logError, logInfo, logWarn } from './logger';
import { analysisToRecord, buildFallbackPost, buildReviewPlaceholder, cleanSalesPost, parseVinylAnalysis } from './normalizers';
import { formatPrice } from './sheetRows';
import type { VinylAnalyzer, VinylRecord } from './types';

export const ANALYSIS_PROMPT = `Analise as imagens de capa (e contracapa, se disponível) deste disco de vinil.

Extraia as seguintes informações:
1. Nome do álbum/disco
2. Nome do artista/banda
3. Ano de lançamento (se visível)
4. Lista de músicas (se visível na contracapa)
5. Gravadora/selo (se visível)
6. Condição aparente do disco e da capa (com base nas fotos)

Responda apenas com JSON no formato:
{
  "name": "nome do álbum",
  "artist": "nome do artista",
  "year": "ano ou null",
  "tracklist": ["lista", "de", "músicas"],
  "label": "gravadora ou null",
  "condition": "descrição da condição",
  "notes": "outros detalhes relevantes"
}

Seja preciso e extraia apenas informações visíveis nas imagens.`;

const IMAGE_MIME_BY_EXTENSION: Record<string, string> = {
  '.png': 'image/png',
  '.webp': 'image/webp'
};

function mimeTypeFor(filePath: string): string {
  return IMAGE_MIME_BY_EXTENSION[path.extname(filePath).toLowerCase()] ?? 'image/jpeg';
}

async function imagePart(filePath: string): Promise<Part> {
  const contents = await readFile(filePath);
  return { inlineData: { data: contents.toString('base64'), mimeType: mimeTypeFor(filePath) } };
}

export function buildSalesPostPrompt(record: VinylRecord): string {
  return `Crie um post atrativo para venda deste disco de vinil no Instagram.

Informações do disco:
- Nome: ${record.name}
- Artista: ${record.artist}
- Ano: ${record.year ?? 'não informado'}
- Condição: ${record.condition ?? 'não informada'}
- Descrição: ${record.description ?? 'sem descrição adicional'}
- Preço: ${record.price === undefined ? 'a definir' : formatPrice(record.price)}

O post deve:
1. Ser conciso e atrativo (máximo 300 caracteres no texto principal)
2. Destacar pontos positivos do disco
3. Incluir as principais músicas/faixas do disco
4. Incluir emojis relevantes
5. Ter call-to-action (chamar no direct, etc.)
6. Incluir hashtags relevantes no final

IMPORTANTE: retorne APENAS o post final, sem introduções como "Aqui está..." ou explicações.

Formato desejado:
[Texto principal atrativo]

🎵 Principais faixas:
[Lista das principais músicas do disco]

💿 Detalhes:
[Condição, gravadora, etc.]

📩 Interessado? Chama no direct!

[Hashtags relevantes]`;
}

export class GeminiGateway implements VinylAnalyzer {
  private readonly ai: GoogleGenAI;

  constructor(apiKey: string, private readonly model: string) {
    this.ai = new GoogleGenAI({ apiKey });
  }

  async analyzeVinylImages(frontImagePath: string, backImagePath?: string): Promise<VinylRecord> {
    try {
      const parts: Part[] = [{ text: ANALYSIS_PROMPT }, await imagePart(frontImagePath)];
      if (backImagePath && existsSync(backImagePath)) {
        parts.push(await imagePart(backImagePath));
      }

      const response = await this.ai.models.generateContent({
        model: this.model,
        contents: [{ role: 'user', parts }]
      });

      const record = analysisToRecord(parseVinylAnalysis(response.text ?? ''), frontImagePath, backImagePath);
      logInfo('Vinyl analysis completed', { name: record.name, artist: record.artist });
      return record;
    } catch (error) {
      logError('Vinyl analysis failed, flagging for manual review', { frontImagePath, error });
      return buildReviewPlaceholder(error, frontImagePath, backImagePath);
    }
  }

  async generateSalesPost(record: VinylRecord): Promise<string> {
    try {
      const response = await this.ai.models.generateContent({
        model: this.model,
        contents: buildSalesPostPrompt(record)
      });

      const post = cleanSalesPost(response.text ?? '');
      if (!post) {
        logWarn('Empty sales post returned, using template', { name: record.name });
        return buildFallbackPost(record);
      }

      logInfo('Sales post generated', { name: record.name, length: post.length });
      return post;
    } catch (error) {
      logError('Sales post generation failed, using template', { name: record.name, error });
      return buildFallbackPost(record);
    }
  }
}
