/**
 * Unit tests for MCP Server Error Handling
 *
 * Tests MCPError class, error mapping, factories, and error response formatting.
 *
 * @module tests/unit/server/errors
 */

import { describe, it, expect } from 'vitest';
import {
  MCPError,
  configurationError,
  documentNotFoundError,
  formatErrorResponse,
  getRecoveryHint,
  type ErrorCategory,
} from '../../../src/server/errors.js';
import { loadServerConfig } from '../../../src/server/config.js';
import { EmbeddingError } from '../../../src/services/embedding/provider.js';
import { MetadataExtractionError } from '../../../src/services/extraction/json-response.js';
import {
  ContractNotFoundError,
  SearchBackendError,
  SearchBackendErrorCode,
} from '../../../src/services/storage/types.js';
import { ValidationError } from '../../../src/utils/validation.js';

// ═══════════════════════════════════════════════════════════════════════════════
// MCPError CLASS TESTS
// ═══════════════════════════════════════════════════════════════════════════════

describe('MCPError', () => {
  it('should create error with category, message, and details', () => {
    const error = new MCPError('VALIDATION_ERROR', 'top_k must be at least 1', { field: 'top_k' });

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('MCPError');
    expect(error.category).toBe('VALIDATION_ERROR');
    expect(error.message).toBe('top_k must be at least 1');
    expect(error.details).toEqual({ field: 'top_k' });
  });

  describe('fromUnknown', () => {
    it('should return an MCPError unchanged', () => {
      const original = new MCPError('VALIDATION_ERROR', 'bad');

      expect(MCPError.fromUnknown(original)).toBe(original);
    });

    it.each<[string, Error, ErrorCategory]>([
      ['ValidationError', new ValidationError('bad input'), 'VALIDATION_ERROR'],
      [
        'SearchBackendError',
        new SearchBackendError('query failed', SearchBackendErrorCode.QUERY_FAILED),
        'SEARCH_BACKEND_ERROR',
      ],
      ['ContractNotFoundError', new ContractNotFoundError('A'), 'DOCUMENT_NOT_FOUND'],
      ['EmbeddingError', new EmbeddingError('down', 'HTTP_ERROR'), 'EMBEDDING_FAILED'],
      [
        'MetadataExtractionError',
        new MetadataExtractionError('no json', 'INVALID_JSON'),
        'METADATA_EXTRACTION_FAILED',
      ],
    ])('should map %s to its category', (_name, error, category) => {
      expect(MCPError.fromUnknown(error).category).toBe(category);
    });

    it('should carry code and details of custom errors', () => {
      const error = MCPError.fromUnknown(
        new SearchBackendError('wrong size', SearchBackendErrorCode.INVALID_VECTOR_DIMENSIONS, { expected: 4 })
      );

      expect(error.message).toBe('wrong size');
      expect(error.details).toEqual({
        originalName: 'SearchBackendError',
        errorCode: 'INVALID_VECTOR_DIMENSIONS',
        errorDetails: { expected: 4 },
      });
    });

    it('should omit code and details a plain Error lacks', () => {
      expect(MCPError.fromUnknown(new TypeError('x')).details).toEqual({ originalName: 'TypeError' });
    });

    it('should keep the category of configuration failures', () => {
      let caught: unknown;
      try {
        loadServerConfig({ EMBEDDING_DIM: 'abc' });
      } catch (error) {
        caught = error;
      }

      expect(MCPError.fromUnknown(caught).category).toBe('CONFIGURATION_ERROR');
    });

    it('should not infer a category from an error name alone', () => {
      const error = new Error('missing key');
      error.name = 'ConfigurationError';

      expect(MCPError.fromUnknown(error).category).toBe('INTERNAL_ERROR');
    });

    it('should use the default category for unknown error names', () => {
      expect(MCPError.fromUnknown(new Error('x'), 'EMBEDDING_FAILED').category).toBe('EMBEDDING_FAILED');
      expect(MCPError.fromUnknown(new Error('x')).category).toBe('INTERNAL_ERROR');
    });

    it('should wrap non-Error values', () => {
      const error = MCPError.fromUnknown('string failure');

      expect(error.category).toBe('INTERNAL_ERROR');
      expect(error.message).toBe('string failure');
      expect(error.details).toEqual({ originalValue: 'string failure' });
    });
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// FACTORIES AND FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

describe('error factories', () => {
  it('should point a missing contract at the document list', () => {
    const error = documentNotFoundError('采购合同');

    expect(error.category).toBe('DOCUMENT_NOT_FOUND');
    expect(error.message).toBe(
      'Contract not found: 采购合同. Use contract_document_list to browse indexed contracts.'
    );
    expect(error.details).toEqual({ contractName: '采购合同' });
  });

  it('should build configuration errors', () => {
    expect(configurationError('missing').category).toBe('CONFIGURATION_ERROR');
  });
});

describe('formatErrorResponse', () => {
  it('should include category, message, recovery and details', () => {
    const response = formatErrorResponse(
      new MCPError('VALIDATION_ERROR', 'top_k must be at most 50', { top_k: 99 })
    );

    expect(response).toEqual({
      success: false,
      error: {
        category: 'VALIDATION_ERROR',
        message: 'top_k must be at most 50',
        recovery: {
          tool: 'contract_search',
          hint: 'Check parameter ranges: top_k 1-50, weights 0-10, dates YYYY-MM-DD, min <= max',
        },
        details: { top_k: 99 },
      },
    });
  });

  it('should route extraction failures to manual metadata save', () => {
    expect(getRecoveryHint('METADATA_EXTRACTION_FAILED').tool).toBe('contract_metadata_save');
    expect(getRecoveryHint('DOCUMENT_NOT_FOUND').tool).toBe('contract_document_list');
  });
});
