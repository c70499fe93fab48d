import type {
  DocumentMetadata,
  Endereco,
  Imovel,
  MatriculaRecord,
  PessoaEnvolvida,
  Proprietario,
  Referencia,
  Registro,
  SelosECustas,
  ValorAto,
  ValorMencionado,
} from '@rgi-reader/shared';

type JsonObject = Record<string, unknown>;

/**
 * Partial record parsed from one batch response
 */
export interface MatriculaFragment {
  document_metadata: Omit<DocumentMetadata, 'paginas_processadas'>;
  imovel: Imovel;
  proprietarios: Proprietario[];
  registros: Registro[];
  valores_mencionados: ValorMencionado[];
  selos_e_custas: Partial<SelosECustas>;
  referencias: Referencia[];
  confidence: JsonObject;
}

const METADATA_FIELDS = [
  'matricula',
  'ficha',
  'cartorio',
  'oficio',
  'cidade',
  'uf',
  'cnm',
  'observacoes',
] as const;

const IMOVEL_TEXT_FIELDS = [
  'unidade',
  'descricao',
  'condominio_fracao_ideal',
  'vagas_estacionamento',
  'dimensoes',
  'confrontacoes',
] as const;

const ENDERECO_FIELDS = ['logradouro', 'numero', 'bairro', 'cidade', 'uf'] as const;

const PROPRIETARIO_FIELDS = [
  'nome',
  'cpf',
  'rg',
  'nacionalidade',
  'estado_civil',
  'profissao',
  'regime_de_bens',
  'conjuge',
  'quota_fracao',
  'observacoes',
] as const;

const PESSOA_FIELDS = ['nome', 'relacao', 'cpf'] as const;

const IMOVEL_KEYS = ['endereco', ...IMOVEL_TEXT_FIELDS] as const;

export const PESSOAS_KEY = 'pessoas_envolvidas';
export const MISSPELLED_PESSOAS_KEY = 'pessoas_envovidas';

export const isRecord = (value: unknown): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * null, undefined, "", [] and {} carry no information
 */
export const isEmptyValue = (value: unknown): boolean =>
  value === null ||
  value === undefined ||
  value === '' ||
  (Array.isArray(value) && value.length === 0) ||
  (isRecord(value) && Object.keys(value).length === 0);

const asString = (value: unknown): string | undefined => {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return undefined;
};

const asNumber = (value: unknown): number | undefined => {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
};

const asObjectList = (value: unknown): JsonObject[] => (Array.isArray(value) ? value.filter(isRecord) : []);

const asStringList = (value: unknown): string[] =>
  Array.isArray(value) ? value.map(asString).filter((item): item is string => item !== undefined) : [];

const pickStrings = <K extends string>(raw: JsonObject, keys: readonly K[]): Partial<Record<K, string>> => {
  const picked: Partial<Record<K, string>> = {};
  for (const key of keys) {
    const value = asString(raw[key]);
    if (value !== undefined) {
      picked[key] = value;
    }
  }
  return picked;
};

const copyKey = <T, K extends keyof T>(target: T, source: T, key: K): void => {
  target[key] = source[key];
};

/**
 * Rename the misspelled `pessoas_envovidas` key on a registro
 *
 * When both spellings are present the misspelled entries are appended
 * after the correct ones, so no person is lost.
 */
export const normalizeRegistroKeys = (raw: JsonObject): JsonObject => {
  if (!(MISSPELLED_PESSOAS_KEY in raw)) {
    return raw;
  }

  const { [MISSPELLED_PESSOAS_KEY]: misspelled, ...rest } = raw;
  const toList = (value: unknown): unknown[] => {
    if (Array.isArray(value)) return value;
    return value === null || value === undefined ? [] : [value];
  };

  return {
    ...rest,
    [PESSOAS_KEY]: [...toList(rest[PESSOAS_KEY]), ...toList(misspelled)],
  };
};

const coercePessoa = (raw: JsonObject): PessoaEnvolvida => pickStrings(raw, PESSOA_FIELDS);

/**
 * A bare string is read as the person's name; anything else is dropped and logged
 */
const coercePessoas = (entries: unknown[], numero: string | undefined): PessoaEnvolvida[] => {
  const pessoas: PessoaEnvolvida[] = [];
  for (const entry of entries) {
    if (isRecord(entry)) {
      pessoas.push(coercePessoa(entry));
    } else if (typeof entry === 'string' && entry.trim() !== '') {
      pessoas.push({ nome: entry.trim() });
    } else {
      console.log(`[OpenAI] Dropped pessoa_envolvida entry in registro ${numero ?? '?'}: ${JSON.stringify(entry)}`);
    }
  }
  return pessoas;
};

const coerceValorAto = (raw: JsonObject): ValorAto => {
  const valor: ValorAto = pickStrings(raw, ['rotulo', 'moeda', 'valor_str'] as const);
  const valorNum = asNumber(raw.valor_num);
  if (valorNum !== undefined) valor.valor_num = valorNum;
  return valor;
};

const coerceRegistro = (input: JsonObject): Registro => {
  const raw = normalizeRegistroKeys(input);
  const registro: Registro = pickStrings(raw, ['numero', 'tipo', 'data', 'detalhes'] as const);

  const pessoas = raw[PESSOAS_KEY];
  if (Array.isArray(pessoas)) {
    registro.pessoas_envolvidas = coercePessoas(pessoas, registro.numero);
  }
  if (Array.isArray(raw.valores)) {
    registro.valores = asObjectList(raw.valores).map(coerceValorAto);
  }
  return registro;
};

const coerceValorMencionado = (raw: JsonObject): ValorMencionado => {
  const valor: ValorMencionado = pickStrings(raw, ['moeda', 'valor_str', 'contexto'] as const);
  const valorNum = asNumber(raw.valor_num);
  if (valorNum !== undefined) valor.valor_num = valorNum;
  const pagina = asNumber(raw.pagina);
  if (pagina !== undefined) valor.pagina = pagina;
  return valor;
};

const coerceReferencia = (raw: JsonObject): Referencia => {
  const referencia: Referencia = pickStrings(raw, ['trecho'] as const);
  const pagina = asNumber(raw.pagina);
  if (pagina !== undefined) referencia.pagina = pagina;
  return referencia;
};

const coerceImovel = (raw: JsonObject): Imovel => {
  const imovel: Imovel = pickStrings(raw, IMOVEL_TEXT_FIELDS);
  if (isRecord(raw.endereco)) {
    const endereco: Endereco = pickStrings(raw.endereco, ENDERECO_FIELDS);
    imovel.endereco = endereco;
  }
  return imovel;
};

const coerceSelosECustas = (raw: JsonObject): Partial<SelosECustas> => {
  const selos: Partial<SelosECustas> = pickStrings(raw, ['itbi', 'custas'] as const);
  if (Array.isArray(raw.guias)) selos.guias = asStringList(raw.guias);
  if (Array.isArray(raw.selos)) selos.selos = asStringList(raw.selos);
  return selos;
};

/**
 * Turn one parsed model response into a typed fragment
 * Unknown keys and list entries that are not objects are ignored.
 */
export const coerceFragment = (raw: JsonObject): MatriculaFragment => {
  return {
    document_metadata: isRecord(raw.document_metadata) ? pickStrings(raw.document_metadata, METADATA_FIELDS) : {},
    imovel: isRecord(raw.imovel) ? coerceImovel(raw.imovel) : {},
    proprietarios: asObjectList(raw.proprietarios).map((p): Proprietario => pickStrings(p, PROPRIETARIO_FIELDS)),
    registros: asObjectList(raw.registros).map(coerceRegistro),
    valores_mencionados: asObjectList(raw.valores_mencionados).map(coerceValorMencionado),
    selos_e_custas: isRecord(raw.selos_e_custas) ? coerceSelosECustas(raw.selos_e_custas) : {},
    referencias: asObjectList(raw.referencias).map(coerceReferencia),
    confidence: isRecord(raw.confidence) ? { ...raw.confidence } : {},
  };
};

/**
 * Record returned when nothing was extracted (e.g., a PDF without pages)
 */
export const createEmptyRecord = (): MatriculaRecord => ({
  document_metadata: { paginas_processadas: 0 },
  imovel: {},
  proprietarios: [],
  registros: [],
  valores_mencionados: [],
  selos_e_custas: { guias: [], selos: [] },
  referencias: [],
  confidence: {},
});

/**
 * Merge a batch fragment into the accumulated record
 *
 * - metadata: later non-empty values replace earlier ones
 * - imovel, itbi, custas: first non-empty value wins
 * - lists: concatenated in batch order
 */
export const mergeFragment = (record: MatriculaRecord, fragment: MatriculaFragment): MatriculaRecord => {
  const metadata: DocumentMetadata = { ...record.document_metadata };
  for (const key of METADATA_FIELDS) {
    if (!isEmptyValue(fragment.document_metadata[key])) {
      metadata[key] = fragment.document_metadata[key];
    }
  }

  const imovel: Imovel = { ...record.imovel };
  for (const key of IMOVEL_KEYS) {
    if (isEmptyValue(imovel[key]) && !isEmptyValue(fragment.imovel[key])) {
      copyKey(imovel, fragment.imovel, key);
    }
  }

  const source = fragment.selos_e_custas;
  const selosECustas: SelosECustas = {
    ...record.selos_e_custas,
    guias: [...record.selos_e_custas.guias, ...(source.guias ?? [])],
    selos: [...record.selos_e_custas.selos, ...(source.selos ?? [])],
  };
  if (isEmptyValue(selosECustas.itbi) && !isEmptyValue(source.itbi)) selosECustas.itbi = source.itbi;
  if (isEmptyValue(selosECustas.custas) && !isEmptyValue(source.custas)) selosECustas.custas = source.custas;

  return {
    document_metadata: metadata,
    imovel,
    proprietarios: [...record.proprietarios, ...fragment.proprietarios],
    registros: [...record.registros, ...fragment.registros],
    valores_mencionados: [...record.valores_mencionados, ...fragment.valores_mencionados],
    selos_e_custas: selosECustas,
    referencias: [...record.referencias, ...fragment.referencias],
    confidence: { ...record.confidence, ...fragment.confidence },
  };
};

/**
 * Keep only the digits of a CPF; undefined when none are left
 */
const cleanCpf = (cpf: string | undefined): string | undefined => {
  const digits = cpf?.replace(/\D/g, '');
  return digits ? digits : undefined;
};

/**
 * Stamp the processed page count and normalize CPFs
 */
export const finalizeRecord = (record: MatriculaRecord, pagesProcessed: number): MatriculaRecord => ({
  ...record,
  document_metadata: { ...record.document_metadata, paginas_processadas: pagesProcessed },
  proprietarios: record.proprietarios.map(({ cpf, ...rest }): Proprietario => {
    const digits = cleanCpf(cpf);
    return digits ? { ...rest, cpf: digits } : rest;
  }),
  registros: record.registros.map((registro): Registro => {
    if (!registro.pessoas_envolvidas) {
      return registro;
    }

    return {
      ...registro,
      pessoas_envolvidas: registro.pessoas_envolvidas.map(({ cpf, ...rest }): PessoaEnvolvida => {
        const digits = cleanCpf(cpf);
        return digits ? { ...rest, cpf: digits } : rest;
      }),
    };
  }),
});
