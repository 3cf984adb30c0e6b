import { Logger, NotFoundException } from '@nestjs/common';
import { BorrowersService } from './borrowers.service';
import { Borrower } from './entities/borrower.entity';
import { InMemoryDatabase } from '../../test/support/in-memory-database';
import { createLibraryDatabase, libraryTestingModule, seedCatalog } from '../../test/support/library-database';

describe('BorrowersService', () => {
  let db: InMemoryDatabase;
  let service: BorrowersService;

  beforeEach(async () => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
    db = createLibraryDatabase();
    seedCatalog(db);
    const module = await libraryTestingModule(db, [BorrowersService]);
    service = module.get(BorrowersService);
  });

  afterEach(() => jest.restoreAllMocks());

  it('registers an active borrower and reports it', async () => {
    const res = await service.registerBorrower({ firstName: 'Luis', lastName: 'Gómez', email: 'luis@example.test' });

    expect(res.success).toBe(true);
    expect(res.message).toBe('Borrower Luis Gómez created successfully.');
    expect(res.borrower).toEqual(
      expect.objectContaining({ id: 8, firstName: 'Luis', lastName: 'Gómez', email: 'luis@example.test', address: null, active: true }),
    );
  });

  it('reports a failed registration instead of throwing', async () => {
    db.failNextSave(Borrower, new Error('value too long for type character varying(100)'));

    const res = await service.registerBorrower({ firstName: 'Luis', lastName: 'Gómez' });

    expect(res).toEqual({
      success: false,
      message: 'Error creating borrower: value too long for type character varying(100)',
    });
    expect(db.all(Borrower).map((b) => b.id)).toEqual([7]);
  });

  it('gets a borrower by id or null', async () => {
    expect((await service.getBorrower(7))?.fullName).toBe('Ana Pérez');
    expect(await service.getBorrower(70)).toBeNull();
  });

  it('treats an id beyond the integer range as unknown', async () => {
    db.failReads(new Error('value "3000000000" is out of range for type integer'));

    expect(await service.getBorrower(3000000000)).toBeNull();
    await expect(service.updateBorrower(3000000000, { active: false })).rejects.toThrow('Borrower not found');
  });

  it('lists borrowers matching a predicate', async () => {
    db.seed(Borrower, [{ id: 9, firstName: 'Marta', lastName: 'Ruiz', active: false }]);

    expect((await service.listBorrowers({ active: true })).map((b) => b.id)).toEqual([7]);
    expect((await service.listBorrowers()).map((b) => b.lastName)).toEqual(['Pérez', 'Ruiz']);
  });

  it('deactivates a borrower', async () => {
    const updated = await service.updateBorrower(7, { active: false });

    expect(updated.active).toBe(false);
    expect((await service.getBorrower(7))?.active).toBe(false);
  });

  it('fails to update a missing borrower', async () => {
    await expect(service.updateBorrower(70, { active: false })).rejects.toBeInstanceOf(NotFoundException);
  });
});
