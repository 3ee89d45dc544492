/**
 * Default Configuration Values
 *
 * The loader merges the user's config.toml ON TOP of these defaults.
 */

import type { Config } from './schema.js';

export const DEFAULT_CONFIG: Config = {
  chunking: {
    chunk_size: 1000,
    chunk_overlap: 200,
  },

  embedding: {
    dimensions: 1536,
    batch_size: 16,
    max_attempts: 3,
    base_delay_ms: 1000,
    timeout_ms: 30000,
    token_margin_seconds: 300,
  },

  ingestion: {
    file_extensions: '.md,.txt,.html,.rst',
    batch_size: 10,
    max_concurrent_files: 3,
    max_concurrent_chunks: 4,
    write_batch_size: 20,
    extract_code_examples: false,
    min_code_length: 1000,
  },

  crawl: {
    max_depth: 3,
    max_concurrent: 10,
    timeout_ms: 30000,
    user_agent: 'doc-retriever/0.1',
  },

  search: {
    match_count: 5,
    excerpt_length: 1000,
  },

  server: {
    tool_timeout_ms: 300000, // 5 minutes
  },
};

/**
 * Config file template (TOML format)
 * Written to ~/.docr/config.toml on first run
 */
export const CONFIG_TEMPLATE = `# doc-retriever configuration
# Location: ~/.docr/config.toml
# Endpoints and credentials are read from the environment (.env), not from here.

[chunking]
chunk_size = ${DEFAULT_CONFIG.chunking.chunk_size}
chunk_overlap = ${DEFAULT_CONFIG.chunking.chunk_overlap}

[embedding]
dimensions = ${DEFAULT_CONFIG.embedding.dimensions}  # must match vector(1536) in the database
batch_size = ${DEFAULT_CONFIG.embedding.batch_size}
max_attempts = ${DEFAULT_CONFIG.embedding.max_attempts}
base_delay_ms = ${DEFAULT_CONFIG.embedding.base_delay_ms}
timeout_ms = ${DEFAULT_CONFIG.embedding.timeout_ms}
token_margin_seconds = 300

[ingestion]
file_extensions = "${DEFAULT_CONFIG.ingestion.file_extensions}"
batch_size = ${DEFAULT_CONFIG.ingestion.batch_size}
max_concurrent_files = ${DEFAULT_CONFIG.ingestion.max_concurrent_files}
max_concurrent_chunks = ${DEFAULT_CONFIG.ingestion.max_concurrent_chunks}
write_batch_size = ${DEFAULT_CONFIG.ingestion.write_batch_size}
extract_code_examples = ${DEFAULT_CONFIG.ingestion.extract_code_examples}
min_code_length = ${DEFAULT_CONFIG.ingestion.min_code_length}

[crawl]
max_depth = ${DEFAULT_CONFIG.crawl.max_depth}
max_concurrent = ${DEFAULT_CONFIG.crawl.max_concurrent}
timeout_ms = ${DEFAULT_CONFIG.crawl.timeout_ms}
user_agent = "${DEFAULT_CONFIG.crawl.user_agent}"

[search]
match_count = ${DEFAULT_CONFIG.search.match_count}
excerpt_length = ${DEFAULT_CONFIG.search.excerpt_length}

[server]
tool_timeout_ms = ${DEFAULT_CONFIG.server.tool_timeout_ms}  # 5 minutes
`;
