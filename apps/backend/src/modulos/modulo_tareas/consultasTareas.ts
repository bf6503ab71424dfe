/**
 * Consultas de lectura sobre el almacen de tareas.
 *
 * El filtro por estado es un recorrido con igualdad sobre `estado`; no hay
 * orden garantizado en ningun listado. `limite`, si llega, ya fue validado
 * como entero positivo por la capa HTTP.
 */
import { ESTADOS_TAREA, esEstadoTarea } from '../../compartido/tipos/dominio';
import type { Tarea } from '../../compartido/tipos/dominio';
import { exito, falloNoEncontrado, falloValidacion } from '../../compartido/tipos/resultado';
import type { Resultado } from '../../compartido/tipos/resultado';
import type { AlmacenTareas } from './almacenTareas';

export const MENSAJE_ESTADO_FILTRO = `Estado no válido. Debe ser uno de: ${ESTADOS_TAREA.join(', ')}`;

export type ConsultasTareas = {
  obtenerPorId(id: string): Promise<Resultado<Tarea>>;
  listarTodas(limite?: number): Promise<Resultado<Tarea[]>>;
  listarPorEstado(estado: string, limite?: number): Promise<Resultado<Tarea[]>>;
};

export function crearConsultasTareas(almacen: AlmacenTareas): ConsultasTareas {
  return {
    async obtenerPorId(id) {
      const resultado = await almacen.obtener(id);
      if (!resultado.ok) return resultado;
      return resultado.valor ? exito(resultado.valor) : falloNoEncontrado(id);
    },

    listarTodas(limite) {
      return almacen.escanear({ limite });
    },

    async listarPorEstado(estado, limite) {
      if (!esEstadoTarea(estado)) return falloValidacion(MENSAJE_ESTADO_FILTRO);
      return almacen.escanear({ estado, limite });
    }
  };
}
