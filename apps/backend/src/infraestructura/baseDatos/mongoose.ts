/**
 * Conexion a MongoDB con Mongoose.
 */
import mongoose from 'mongoose';
import { configuracion } from '../../configuracion';
import { log, logError } from '../logging/logger';

/**
 * Conecta si hay `MONGODB_URI`. Devuelve `false` cuando no hay URI configurada
 * para que el arranque decida el almacen alterno.
 */
export async function conectarBaseDatos(): Promise<boolean> {
  if (!configuracion.mongoUri) {
    log('warn', 'MONGODB_URI no esta definido; se omite la conexion a MongoDB');
    return false;
  }

  mongoose.set('strictQuery', true);

  try {
    await mongoose.connect(configuracion.mongoUri);
    log('ok', 'Conexion a MongoDB exitosa');
    return true;
  } catch (error) {
    logError('Fallo la conexion a MongoDB', error);
    throw error;
  }
}

export async function desconectarBaseDatos() {
  if (mongoose.connection.readyState === 0) return;
  await mongoose.disconnect();
  log('system', 'Conexion a MongoDB cerrada');
}
