export const MATRICULA_SCHEMA_NAME = 'rgi_schema';

const stringField = { type: 'string' } as const;
const integerField = { type: 'integer' } as const;
const numberField = { type: 'number' } as const;

const pessoaSchema = {
  type: 'object',
  properties: {
    nome: stringField,
    relacao: stringField,
    cpf: stringField,
  },
} as const;

const valorAtoSchema = {
  type: 'object',
  properties: {
    rotulo: stringField,
    moeda: stringField,
    valor_str: stringField,
    valor_num: numberField,
  },
} as const;

/**
 * Output format requested from the model. Not strict: every field is
 * optional and the model omits what it cannot read.
 */
export const matriculaSchema = {
  type: 'object',
  additionalProperties: false,
  properties: {
    document_metadata: {
      type: 'object',
      additionalProperties: false,
      properties: {
        matricula: stringField,
        ficha: stringField,
        cartorio: stringField,
        oficio: stringField,
        cidade: stringField,
        uf: stringField,
        cnm: stringField,
        paginas_processadas: integerField,
        observacoes: stringField,
      },
    },
    imovel: {
      type: 'object',
      additionalProperties: false,
      properties: {
        unidade: stringField,
        endereco: {
          type: 'object',
          additionalProperties: false,
          properties: {
            logradouro: stringField,
            numero: stringField,
            bairro: stringField,
            cidade: stringField,
            uf: stringField,
          },
        },
        descricao: stringField,
        condominio_fracao_ideal: stringField,
        vagas_estacionamento: stringField,
        dimensoes: stringField,
        confrontacoes: stringField,
      },
    },
    proprietarios: {
      type: 'array',
      items: {
        type: 'object',
        additionalProperties: false,
        properties: {
          nome: stringField,
          cpf: stringField,
          rg: stringField,
          nacionalidade: stringField,
          estado_civil: stringField,
          profissao: stringField,
          regime_de_bens: stringField,
          conjuge: stringField,
          quota_fracao: stringField,
          observacoes: stringField,
        },
      },
    },
    registros: {
      type: 'array',
      items: {
        type: 'object',
        additionalProperties: false,
        properties: {
          numero: stringField, // R-3-..., AV-5-...
          tipo: stringField,
          data: stringField,
          detalhes: stringField,
          pessoas_envolvidas: { type: 'array', items: pessoaSchema },
          // misspelling produced by earlier prompt versions, renamed after parsing
          pessoas_envovidas: { type: 'array', items: pessoaSchema },
          valores: { type: 'array', items: valorAtoSchema },
        },
      },
    },
    valores_mencionados: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          moeda: stringField,
          valor_str: stringField,
          valor_num: numberField,
          contexto: stringField,
          pagina: integerField,
        },
      },
    },
    selos_e_custas: {
      type: 'object',
      additionalProperties: false,
      properties: {
        itbi: stringField,
        guias: { type: 'array', items: stringField },
        selos: { type: 'array', items: stringField },
        custas: stringField,
      },
    },
    referencias: {
      type: 'array',
      items: {
        type: 'object',
        additionalProperties: false,
        properties: {
          pagina: integerField,
          trecho: stringField,
        },
      },
    },
    confidence: {
      type: 'object',
      additionalProperties: true,
    },
  },
} as const;
