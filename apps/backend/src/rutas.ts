/**
 * Registro central de rutas del API de tareas.
 */
import { Router } from 'express';
import { crearRutasSalud } from './compartido/salud/rutasSalud';
import type { Reloj } from './compartido/utilidades/fechas';
import { crearRutasTareas } from './modulos/modulo_tareas/rutasTareas';
import type { ControladorTareas } from './modulos/modulo_tareas/controladorTareas';

export function crearRouterApi(controladorTareas: ControladorTareas, reloj: Reloj) {
  const router = Router();

  router.use('/salud', crearRutasSalud(reloj));
  router.use('/tareas', crearRutasTareas(controladorTareas));

  return router;
}
