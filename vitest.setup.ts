// Vitest setup file
// This runs before all tests

// Placeholder credentials; tests never reach a real provider
process.env.OPENAI_API_KEY = "test-key";
process.env.GEMINI_API_KEY = "test-key";

// Keep request logs out of the working tree
process.env.LLM_LOG_ENABLED = "false";
