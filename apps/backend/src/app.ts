/**
 * Crea la app HTTP (Express) del API de tareas.
 *
 * Principios:
 * - Seguridad por defecto (cabeceras, rate-limit)
 * - Validacion en el nucleo y error envelope consistente `{ error, mensaje }`
 * - Sin side-effects al importar: el repositorio y el reloj se inyectan
 */
import cors from 'cors';
import express from 'express';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { configuracion } from './configuracion';
import { crearRouterApi } from './rutas';
import { manejadorErrores, manejadorRutaNoEncontrada } from './compartido/errores/manejadorErrores';
import { relojSistema } from './compartido/utilidades/fechas';
import type { Reloj } from './compartido/utilidades/fechas';
import type { GeneradorId } from './compartido/utilidades/identificadores';
import { reemplazarDecimales } from './compartido/utilidades/numeros';
import { asignarIdSolicitud } from './infraestructura/logging/idSolicitud';
import { crearAlmacenTareas } from './modulos/modulo_tareas/almacenTareas';
import { crearConsultasTareas } from './modulos/modulo_tareas/consultasTareas';
import { crearControladorTareas } from './modulos/modulo_tareas/controladorTareas';
import type { RepositorioTareas } from './modulos/modulo_tareas/repositorioTareas';
import { crearServicioTareas } from './modulos/modulo_tareas/servicioTareas';

export type DependenciasApp = {
  repositorio: RepositorioTareas;
  reloj?: Reloj;
  generarId?: GeneradorId;
};

export function crearApp({ repositorio, reloj = relojSistema, generarId }: DependenciasApp) {
  const almacen = crearAlmacenTareas(repositorio);
  const controlador = crearControladorTareas({
    servicio: crearServicioTareas({ almacen, reloj, generarId }),
    consultas: crearConsultasTareas(almacen),
    reloj
  });

  const app = express();

  // Reduce leakage de informacion sobre la tecnologia del servidor.
  app.disable('x-powered-by');
  app.set('json replacer', reemplazarDecimales);

  app.use(asignarIdSolicitud());
  app.use(helmet());
  app.use(cors({ origin: configuracion.corsOrigenes }));
  app.use(express.json({ limit: configuracion.limiteJson, strict: false }));
  app.use(
    rateLimit({
      windowMs: configuracion.rateLimitWindowMs,
      limit: configuracion.rateLimitLimit,
      standardHeaders: true,
      legacyHeaders: false,
      message: {
        error: 'Demasiadas solicitudes',
        mensaje: 'Se excedio el limite de solicitudes; intente mas tarde'
      }
    })
  );

  app.use('/api', crearRouterApi(controlador, reloj));

  app.use(manejadorRutaNoEncontrada);
  app.use(manejadorErrores);

  return app;
}
