import { CreateCicdSchema1760000000000 } from './1760000000000-CreateCicdSchema';

export const MIGRATIONS = [CreateCicdSchema1760000000000];
