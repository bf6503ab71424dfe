/**
 * Repositorio de tareas en memoria.
 *
 * Se usa en pruebas y cuando no hay `MONGODB_URI` (desarrollo local). Devuelve
 * copias para que nadie mute el estado interno por referencia.
 */
import type { Tarea } from '../../compartido/tipos/dominio';
import type { RepositorioTareas } from './repositorioTareas';

export function crearRepositorioTareasMemoria(iniciales: Tarea[] = []): RepositorioTareas {
  const tareas = new Map<string, Tarea>(iniciales.map((tarea) => [tarea.id, { ...tarea }]));

  return {
    async obtener(id) {
      const tarea = tareas.get(id);
      return tarea ? { ...tarea } : null;
    },

    async insertar(tarea) {
      tareas.set(tarea.id, { ...tarea });
      return { ...tarea };
    },

    async actualizarCampos(id, campos) {
      const actual = tareas.get(id);
      if (!actual) return null;
      const actualizada: Tarea = { ...actual, ...campos };
      tareas.set(id, actualizada);
      return { ...actualizada };
    },

    async eliminar(id) {
      tareas.delete(id);
    },

    async escanear({ estado, limite }) {
      const filtradas = Array.from(tareas.values()).filter((tarea) => !estado || tarea.estado === estado);
      const recortadas = limite ? filtradas.slice(0, limite) : filtradas;
      return recortadas.map((tarea) => ({ ...tarea }));
    }
  };
}
