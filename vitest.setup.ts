// Fixed environment so the zod schema in src/lib/env parses the same way on every machine.
process.env.CHROMA_HOST = 'localhost';
process.env.CHROMA_PORT = '8000';
process.env.RAGME_COLLECTION = 'RagMeDocs';
process.env.LLM_PROVIDER = 'ollama';
process.env.LOG_LEVEL = 'silent';
delete process.env.OPENAI_API_KEY;
delete process.env.CHROMA_API_KEY;
