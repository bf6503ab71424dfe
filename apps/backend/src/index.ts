/**
 * Punto de entrada del API de tareas.
 * Inicializa configuracion, almacen y servidor HTTP.
 */
import { crearApp } from './app';
import { configuracion } from './configuracion';
import { conectarBaseDatos, desconectarBaseDatos } from './infraestructura/baseDatos/mongoose';
import { log, logError } from './infraestructura/logging/logger';
import { crearRepositorioTareasMemoria } from './modulos/modulo_tareas/repositorioTareasMemoria';
import { crearRepositorioTareasMongo } from './modulos/modulo_tareas/repositorioTareasMongo';

async function iniciar() {
  const conectado = await conectarBaseDatos();
  if (!conectado) {
    log('warn', 'Usando almacen de tareas en memoria; los datos se pierden al reiniciar');
  }

  const repositorio = conectado ? crearRepositorioTareasMongo() : crearRepositorioTareasMemoria();
  const app = crearApp({ repositorio });

  const servidor = app.listen(configuracion.puerto, () => {
    log('ok', 'API de tareas escuchando', { puerto: configuracion.puerto, almacen: conectado ? 'mongo' : 'memoria' });
  });

  const apagar = (senal: NodeJS.Signals) => {
    log('system', 'Apagando servidor', { senal });
    servidor.close(() => {
      desconectarBaseDatos()
        .then(() => process.exit(0))
        .catch((error) => {
          logError('Error al cerrar la conexion a MongoDB', error);
          process.exit(1);
        });
    });
  };

  process.once('SIGINT', apagar);
  process.once('SIGTERM', apagar);
}

iniciar().catch((error) => {
  logError('Error al iniciar el servidor', error);
  process.exit(1);
});
