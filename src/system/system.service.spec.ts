import { Test, TestingModule } from '@nestjs/testing';
import { Logger } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { SystemService } from './system.service';

describe('SystemService', () => {
  let service: SystemService;
  const dataSource = { query: jest.fn() };

  beforeEach(async () => {
    jest.resetAllMocks();
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
    const module: TestingModule = await Test.createTestingModule({
      providers: [SystemService, { provide: DataSource, useValue: dataSource }],
    }).compile();

    service = module.get<SystemService>(SystemService);
  });

  afterEach(() => jest.restoreAllMocks());

  it('reports UP when the database answers', async () => {
    dataSource.query.mockResolvedValue([{ '?column?': 1 }]);

    const health = await service.checkHealth();

    expect(dataSource.query).toHaveBeenCalledWith('SELECT 1');
    expect(health.status).toBe('UP');
    expect(health.database.status).toBe('UP');
    expect(health.database.latencyMs).toEqual(expect.any(Number));
  });

  it('reports DOWN with the cause when the query fails', async () => {
    dataSource.query.mockRejectedValue(new Error('connect ECONNREFUSED'));

    const health = await service.checkHealth();

    expect(health.status).toBe('DOWN');
    expect(health.database).toEqual({ status: 'DOWN', message: 'connect ECONNREFUSED' });
    expect(Logger.prototype.error).toHaveBeenCalledWith('Database health check failed: connect ECONNREFUSED');
  });
});
