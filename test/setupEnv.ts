process.env.LOG_LEVEL = "silent";
process.env.LOG_FILE = "";
process.env.OPENAI_API_KEY = "test-key";
process.env.VECTOR_STORE = "memory";
