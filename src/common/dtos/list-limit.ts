/** 목록 조회 limit 상한 */
export const MAX_LIST_LIMIT = 100;

/** Postgres integer(int4) PK 상한. 이보다 큰 id 는 존재할 수 없다 */
export const MAX_ENTITY_ID = 2147483647;
