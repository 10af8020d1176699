import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { QueryFailedError } from 'typeorm';
import { PersistenceExceptionFilter } from './persistence-exception.filter';

describe('PersistenceExceptionFilter', () => {
  it('answers 503 with the driver message', () => {
    const response = {
      status: jest.fn().mockReturnThis(),
      json: jest.fn(),
    };
    const host = new ExecutionContextHost([{}, response]);
    const error = new QueryFailedError('UPDATE products', [], new Error('database is locked'));

    new PersistenceExceptionFilter().catch(error, host);

    expect(response.status).toHaveBeenCalledWith(503);
    expect(response.json).toHaveBeenCalledWith({
      statusCode: 503,
      error: 'Service Unavailable',
      message: 'Erreur de persistance: database is locked',
    });
  });
});
