/**
 * Servicio de escritura de tareas (crear, actualizar, eliminar).
 *
 * Contrato:
 * - `id`, `creado_en` y `actualizado_en` se asignan aqui; el cliente no los controla.
 * - Actualizar y eliminar verifican existencia antes de escribir; un id
 *   inexistente es `NO_ENCONTRADO`, nunca un fallo del almacen.
 * - Sin control de concurrencia: el ultimo en escribir gana.
 */
import type { Tarea } from '../../compartido/tipos/dominio';
import { exito, falloNoEncontrado } from '../../compartido/tipos/resultado';
import type { Resultado } from '../../compartido/tipos/resultado';
import { formatearIso8601, relojSistema } from '../../compartido/utilidades/fechas';
import type { Reloj } from '../../compartido/utilidades/fechas';
import { generarIdTarea } from '../../compartido/utilidades/identificadores';
import type { GeneradorId } from '../../compartido/utilidades/identificadores';
import type { AlmacenTareas } from './almacenTareas';
import { validarActualizacionTarea, validarCreacionTarea } from './validacionesTareas';

export type ServicioTareas = {
  crear(datos: unknown): Promise<Resultado<Tarea>>;
  actualizar(id: string, datos: unknown): Promise<Resultado<Tarea>>;
  eliminar(id: string): Promise<Resultado<string>>;
};

export type DependenciasServicioTareas = {
  almacen: AlmacenTareas;
  reloj?: Reloj;
  generarId?: GeneradorId;
};

export function crearServicioTareas({
  almacen,
  reloj = relojSistema,
  generarId = generarIdTarea
}: DependenciasServicioTareas): ServicioTareas {
  async function verificarExistencia(id: string): Promise<Resultado<Tarea>> {
    const existente = await almacen.obtener(id);
    if (!existente.ok) return existente;
    return existente.valor ? exito(existente.valor) : falloNoEncontrado(id);
  }

  return {
    async crear(datos) {
      const ahora = reloj();
      const validados = validarCreacionTarea(datos, ahora);
      if (!validados.ok) return validados;

      const marca = formatearIso8601(ahora);
      return almacen.insertar({
        id: generarId(),
        ...validados.valor,
        creado_en: marca,
        actualizado_en: marca
      });
    },

    async actualizar(id, datos) {
      const existente = await verificarExistencia(id);
      if (!existente.ok) return existente;

      const ahora = reloj();
      const campos = validarActualizacionTarea(datos, ahora);
      if (!campos.ok) return campos;

      const actualizada = await almacen.fusionar(id, campos.valor, formatearIso8601(ahora));
      if (!actualizada.ok) return actualizada;
      // La tarea pudo eliminarse entre la verificacion y la escritura.
      return actualizada.valor ? exito(actualizada.valor) : falloNoEncontrado(id);
    },

    async eliminar(id) {
      const existente = await verificarExistencia(id);
      if (!existente.ok) return existente;

      const eliminada = await almacen.eliminar(id);
      if (!eliminada.ok) return eliminada;
      return exito(id);
    }
  };
}
