/**
 * Chainable stand-in for a TypeORM SelectQueryBuilder. Terminal methods
 * resolve to whatever the test queues with `result`.
 */
export interface QueryBuilderMock {
  leftJoinAndSelect: jest.Mock;
  innerJoinAndSelect: jest.Mock;
  innerJoin: jest.Mock;
  leftJoin: jest.Mock;
  loadRelationCountAndMap: jest.Mock;
  where: jest.Mock;
  andWhere: jest.Mock;
  orderBy: jest.Mock;
  addOrderBy: jest.Mock;
  getMany: jest.Mock;
  getOne: jest.Mock;
  getCount: jest.Mock;
}

export function queryBuilderMock(): QueryBuilderMock {
  const qb: QueryBuilderMock = {
    leftJoinAndSelect: jest.fn(),
    innerJoinAndSelect: jest.fn(),
    innerJoin: jest.fn(),
    leftJoin: jest.fn(),
    loadRelationCountAndMap: jest.fn(),
    where: jest.fn(),
    andWhere: jest.fn(),
    orderBy: jest.fn(),
    addOrderBy: jest.fn(),
    getMany: jest.fn().mockResolvedValue([]),
    getOne: jest.fn().mockResolvedValue(null),
    getCount: jest.fn().mockResolvedValue(0),
  };
  for (const method of [
    qb.leftJoinAndSelect,
    qb.innerJoinAndSelect,
    qb.innerJoin,
    qb.leftJoin,
    qb.loadRelationCountAndMap,
    qb.where,
    qb.andWhere,
    qb.orderBy,
    qb.addOrderBy,
  ]) {
    method.mockReturnValue(qb);
  }
  return qb;
}
