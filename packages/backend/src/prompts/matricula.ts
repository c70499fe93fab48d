import type OpenAI from 'openai';
import type { PageImage } from '@rgi-reader/backend/types';

export const MATRICULA_INSTRUCTIONS = `Você é um extrator jurídico rigoroso para registros de imóveis brasileiros.
Extraia o conteúdo das imagens e preencha SOMENTE o JSON conforme o schema, sem chaves extras.

Diretrizes:
- NÃO invente. Se algo não estiver visível, omita o campo.
- Datas: dd/mm/aaaa quando claro.
- CPFs: somente dígitos.
- 'imovel.descricao': transcreva fielmente o parágrafo "IMÓVEL - ...".
- 'proprietarios': liste todos os proprietários com os dados visíveis (RG, CPF, estado civil, regime de bens, quotas etc.).
- 'registros': para cada ato (R-*/AV-*):
  • 'numero', 'tipo', 'data' (se houver) e 'detalhes' com uma descrição clara do que foi registrado ou averbado.
  • 'pessoas_envolvidas': pessoas citadas no ato (herdeira, cônjuge, inventariante, ex-cônjuge etc.).
  • 'valores': todos os valores que pertencem a ESSE ato (avaliação, ITBI, imposto de transmissão, valor fiscal etc.).
- 'valores_mencionados': todos os valores do documento, com moeda, valor_str, valor_num, contexto e página.
- 'selos_e_custas': selos, guias e custas como texto simples.
- 'referencias': trechos curtos que justifiquem os campos críticos (matrícula, unidade, proprietários e atos relevantes).
- O documento pode variar: preencha apenas o que estiver legível.`;

type MessageContent = OpenAI.Chat.Completions.ChatCompletionContentPart[];

/**
 * Build the user message for one batch of pages
 * Each image is preceded by its page number in the whole document.
 */
export const buildBatchContent = (pages: PageImage[]): MessageContent => {
  return [
    { type: 'text', text: MATRICULA_INSTRUCTIONS },
    ...pages.flatMap((page): MessageContent => [
      { type: 'text', text: `Página ${page.pageNumber}:` },
      { type: 'image_url', image_url: { url: page.url } },
    ]),
  ];
};
