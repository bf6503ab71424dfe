/**
 * Controlador de tareas.
 *
 * Contrato:
 * - Extrae id/parametros del request, llama al nucleo y traduce su `Resultado`.
 * - Los fallos se lanzan como `ErrorAplicacion`; el envelope lo arma
 *   `manejadorErrores` (los fallos del almacen salen como 500 generico).
 * - Prioridad del listado: `id`, luego `estado`, luego todas.
 */
import type { Request, Response } from 'express';
import { ErrorAplicacion, crearErrorInterno } from '../../compartido/errores/errorAplicacion';
import type { Resultado } from '../../compartido/tipos/resultado';
import { ahoraIso8601, relojSistema } from '../../compartido/utilidades/fechas';
import type { Reloj } from '../../compartido/utilidades/fechas';
import { esUuidValido, normalizarId } from '../../compartido/utilidades/identificadores';
import { obtenerIdSolicitud } from '../../infraestructura/logging/idSolicitud';
import { log } from '../../infraestructura/logging/logger';
import type { ConsultasTareas } from './consultasTareas';
import type { ServicioTareas } from './servicioTareas';

type Traduccion = {
  idSolicitud: string;
  /** Titulo del envelope para fallos de validacion. */
  errorValidacion?: string;
};

function desenvolver<T>(resultado: Resultado<T>, { idSolicitud, errorValidacion = 'Datos inválidos' }: Traduccion): T {
  if (resultado.ok) return resultado.valor;

  const { fallo } = resultado;
  if (fallo.tipo === 'VALIDACION') {
    log('warn', 'Error de validación', { idSolicitud, mensaje: fallo.mensaje });
    throw new ErrorAplicacion(errorValidacion, fallo.mensaje, 400);
  }
  if (fallo.tipo === 'NO_ENCONTRADO') {
    throw new ErrorAplicacion('Tarea no encontrada', `No existe una tarea con el ID: ${fallo.id}`, 404);
  }
  // El detalle ya quedo en el log del almacen.
  throw crearErrorInterno();
}

export function validarIdTarea(valor: unknown): string {
  if (typeof valor !== 'string' || !valor) {
    throw new ErrorAplicacion('Parámetro faltante', 'El ID de la tarea es obligatorio', 400);
  }
  if (!esUuidValido(valor)) {
    throw new ErrorAplicacion('Parámetro inválido', 'El ID proporcionado no tiene formato UUID válido', 400);
  }
  return normalizarId(valor);
}

export function parsearLimite(valor: unknown): number | undefined {
  if (valor === undefined) return undefined;
  const texto = typeof valor === 'string' ? valor.trim() : '';
  const limite = /^\+?\d+$/.test(texto) ? Number(texto) : Number.NaN;
  if (!Number.isSafeInteger(limite) || limite <= 0) {
    throw new ErrorAplicacion('Parámetro inválido', 'El parámetro "limite" debe ser un número entero positivo', 400);
  }
  return limite;
}

function textoQuery(valor: unknown): string {
  return typeof valor === 'string' ? valor : '';
}

export type DependenciasControladorTareas = {
  servicio: ServicioTareas;
  consultas: ConsultasTareas;
  reloj?: Reloj;
};

export function crearControladorTareas({ servicio, consultas, reloj = relojSistema }: DependenciasControladorTareas) {
  /**
   * Crea una tarea. Responde 201 con el registro completo.
   */
  async function crearTarea(req: Request, res: Response) {
    const idSolicitud = obtenerIdSolicitud(res);
    const tarea = desenvolver(await servicio.crear(req.body), { idSolicitud });
    res.status(201).json({ mensaje: 'Tarea creada correctamente', tarea, timestamp: ahoraIso8601(reloj) });
  }

  async function obtenerTarea(req: Request, res: Response) {
    const idSolicitud = obtenerIdSolicitud(res);
    const id = validarIdTarea(req.params.id);
    const tarea = desenvolver(await consultas.obtenerPorId(id), { idSolicitud });
    res.json({ tarea });
  }

  /**
   * Lista tareas. `?id=` devuelve una sola, `?estado=` filtra y `?limite=` recorta.
   */
  async function listarTareas(req: Request, res: Response) {
    const idSolicitud = obtenerIdSolicitud(res);
    const limite = parsearLimite(req.query.limite);
    const id = textoQuery(req.query.id);
    const estado = textoQuery(req.query.estado);

    if (id) {
      log('info', 'Buscando tarea por ID', { idSolicitud, id });
      const tarea = desenvolver(await consultas.obtenerPorId(validarIdTarea(id)), { idSolicitud });
      res.json({ tarea });
      return;
    }

    log('info', estado ? 'Filtrando tareas por estado' : 'Listando todas las tareas', { idSolicitud, estado, limite });
    const resultado = estado
      ? await consultas.listarPorEstado(estado, limite)
      : await consultas.listarTodas(limite);
    const tareas = desenvolver(resultado, { idSolicitud, errorValidacion: 'Parámetro inválido' });
    res.json({ tareas, total: tareas.length });
  }

  /**
   * Actualiza solo los campos enviados. 404 si la tarea no existe.
   */
  async function actualizarTarea(req: Request, res: Response) {
    const idSolicitud = obtenerIdSolicitud(res);
    const id = validarIdTarea(req.params.id);
    const tarea = desenvolver(await servicio.actualizar(id, req.body), { idSolicitud });
    res.json({ mensaje: 'Tarea actualizada correctamente', tarea, timestamp: ahoraIso8601(reloj) });
  }

  async function eliminarTarea(req: Request, res: Response) {
    const idSolicitud = obtenerIdSolicitud(res);
    const id = validarIdTarea(req.params.id);
    const eliminado = desenvolver(await servicio.eliminar(id), { idSolicitud });
    res.json({ mensaje: 'Tarea eliminada correctamente', id: eliminado, timestamp: ahoraIso8601(reloj) });
  }

  return { crearTarea, obtenerTarea, listarTareas, actualizarTarea, eliminarTarea };
}

export type ControladorTareas = ReturnType<typeof crearControladorTareas>;
