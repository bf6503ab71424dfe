// Setup comun de Vitest: endurece cada archivo de pruebas.
import { instalarTestHardening } from './vitestStrict';

instalarTestHardening();
