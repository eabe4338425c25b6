import { InitialSchema1760000000000 } from './1760000000000-InitialSchema';

export const MIGRATIONS = [InitialSchema1760000000000];
