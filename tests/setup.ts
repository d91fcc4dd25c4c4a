// Set before any module under test reads its configuration
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';
process.env.OPENAI_API_KEY = 'test-key';
process.env.EMBEDDING_MODEL = 'text-embedding-3-small';
process.env.LLM_MODEL = 'gpt-4o-mini';
process.env.LLM_TEMPERATURE = '0.1';

// Global test utilities
declare global {
    var testUtils: {
        generateMockEmbedding: (dimension?: number) => number[];
    };
}

globalThis.testUtils = {
    generateMockEmbedding: (dimension: number = 1536) =>
        Array.from({ length: dimension }, () => Math.random() * 2 - 1)
};

export {};
