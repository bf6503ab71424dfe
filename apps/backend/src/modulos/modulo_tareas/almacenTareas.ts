/**
 * Almacen de tareas.
 *
 * Contrato:
 * - Envuelve un `RepositorioTareas` y nunca lanza: cualquier fallo del backend
 *   se registra con detalle y se devuelve como fallo `ALMACEN`.
 * - No interpreta ni reintenta errores.
 * - La ausencia de un registro es `null`, no un fallo.
 */
import type { CamposActualizacionTarea, Tarea } from '../../compartido/tipos/dominio';
import { exito, falloAlmacen } from '../../compartido/tipos/resultado';
import type { Resultado } from '../../compartido/tipos/resultado';
import { log, logError } from '../../infraestructura/logging/logger';
import type { FiltroTareas, RepositorioTareas } from './repositorioTareas';

export type AlmacenTareas = {
  obtener(id: string): Promise<Resultado<Tarea | null>>;
  insertar(tarea: Tarea): Promise<Resultado<Tarea>>;
  fusionar(id: string, campos: CamposActualizacionTarea, actualizadoEn: string): Promise<Resultado<Tarea | null>>;
  eliminar(id: string): Promise<Resultado<void>>;
  escanear(filtro?: FiltroTareas): Promise<Resultado<Tarea[]>>;
};

export function crearAlmacenTareas(repositorio: RepositorioTareas): AlmacenTareas {
  async function ejecutar<T>(operacion: string, meta: Record<string, unknown>, accion: () => Promise<T>) {
    try {
      return exito(await accion());
    } catch (error) {
      logError('Fallo la operacion en el almacen de tareas', error, { operacion, ...meta });
      return falloAlmacen(error);
    }
  }

  return {
    obtener(id) {
      return ejecutar('obtener', { id }, () => repositorio.obtener(id));
    },

    async insertar(tarea) {
      const resultado = await ejecutar('insertar', { id: tarea.id }, () => repositorio.insertar(tarea));
      if (resultado.ok) log('info', 'Tarea creada correctamente', { id: tarea.id });
      return resultado;
    },

    async fusionar(id, campos, actualizadoEn) {
      const resultado = await ejecutar('fusionar', { id, campos: Object.keys(campos) }, () =>
        repositorio.actualizarCampos(id, { ...campos, actualizado_en: actualizadoEn })
      );
      if (resultado.ok && resultado.valor) log('info', 'Tarea actualizada correctamente', { id });
      return resultado;
    },

    async eliminar(id) {
      const resultado = await ejecutar('eliminar', { id }, () => repositorio.eliminar(id));
      if (resultado.ok) log('info', 'Tarea eliminada correctamente', { id });
      return resultado;
    },

    escanear(filtro = {}) {
      return ejecutar('escanear', { ...filtro }, () => repositorio.escanear(filtro));
    }
  };
}
