/**
 * Registry document identification
 */
export interface DocumentMetadata {
	matricula?: string;
	ficha?: string;
	cartorio?: string;
	oficio?: string; // e.g., "2º Ofício"
	cidade?: string;
	uf?: string;
	cnm?: string; // Código Nacional de Matrícula
	paginas_processadas: number;
	observacoes?: string;
}

export interface Endereco {
	logradouro?: string;
	numero?: string;
	bairro?: string;
	cidade?: string;
	uf?: string;
}

/**
 * Property description (the "IMÓVEL - ..." paragraph and its parts)
 */
export interface Imovel {
	unidade?: string;
	endereco?: Endereco;
	descricao?: string;
	condominio_fracao_ideal?: string;
	vagas_estacionamento?: string;
	dimensoes?: string;
	confrontacoes?: string;
}

export interface Proprietario {
	nome?: string;
	cpf?: string;
	rg?: string;
	nacionalidade?: string;
	estado_civil?: string;
	profissao?: string;
	regime_de_bens?: string;
	conjuge?: string;
	quota_fracao?: string;
	observacoes?: string;
}

export interface PessoaEnvolvida {
	nome?: string;
	relacao?: string; // e.g., "herdeira", "cônjuge", "inventariante"
	cpf?: string;
}

export interface ValorAto {
	rotulo?: string; // e.g., "valor fiscal", "ITBI"
	moeda?: string; // "BRL", "CR$", ...
	valor_str?: string;
	valor_num?: number;
}

/**
 * A registered act (R-*) or annotation (AV-*)
 */
export interface Registro {
	numero?: string; // e.g., "R-3", "AV-5"
	tipo?: string;
	data?: string;
	detalhes?: string;
	pessoas_envolvidas?: PessoaEnvolvida[];
	valores?: ValorAto[];
}

export interface ValorMencionado {
	moeda?: string;
	valor_str?: string;
	valor_num?: number;
	contexto?: string;
	pagina?: number;
}

export interface SelosECustas {
	itbi?: string;
	guias: string[];
	selos: string[];
	custas?: string;
}

/**
 * Short excerpt backing a critical field
 */
export interface Referencia {
	pagina?: number;
	trecho?: string;
}

/**
 * Full extraction result for one registry document
 */
export interface MatriculaRecord {
	document_metadata: DocumentMetadata;
	imovel: Imovel;
	proprietarios: Proprietario[];
	registros: Registro[];
	valores_mencionados: ValorMencionado[];
	selos_e_custas: SelosECustas;
	referencias: Referencia[];
	confidence: Record<string, unknown>;
}

/**
 * Extraction settings exposed to clients
 */
export interface ExtractionOptions {
	models: string[];
	defaultModel: string;
	dpi: {
		min: number;
		max: number;
		step: number;
		default: number;
	};
}

/**
 * API request/response types for backend communication
 */
export interface ExtractResponse {
	success: true;
	data: MatriculaRecord;
	pageCount?: number;
	resultCode?: string | null;
	cached?: boolean;
}

export interface ExtractErrorResponse {
	success: false;
	error: string;
	details?: string;
	/** Record built from the batches that completed before the failure */
	partial?: MatriculaRecord;
}

export type ApiResponse<T> = { success: true; data: T } | ExtractErrorResponse;
