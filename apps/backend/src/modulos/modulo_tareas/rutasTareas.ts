/**
 * Rutas de tareas.
 *
 * PUT/DELETE sin id se enrutan igual para responder 400 "Parámetro faltante".
 */
import { Router } from 'express';
import type { ControladorTareas } from './controladorTareas';

export function crearRutasTareas(controlador: ControladorTareas) {
  const router = Router();

  router.get('/', controlador.listarTareas);
  router.post('/', controlador.crearTarea);
  router.put('/', controlador.actualizarTarea);
  router.delete('/', controlador.eliminarTarea);

  router.get('/:id', controlador.obtenerTarea);
  router.put('/:id', controlador.actualizarTarea);
  router.patch('/:id', controlador.actualizarTarea);
  router.delete('/:id', controlador.eliminarTarea);

  return router;
}
