/**
 * Middleware de manejo de errores para el API.
 *
 * Contrato:
 * - Si se lanza/propaga `ErrorAplicacion`, se serializa como `{ error, mensaje }`.
 * - JSON malformado responde 400 y payload excedido 413 (errores de body-parser).
 * - Cualquier otro error se registra con su detalle y se responde 500 generico.
 *
 * Nota: el formato del envelope de error es parte del contrato publico del API.
 */
import type { NextFunction, Request, Response } from 'express';
import { ErrorAplicacion, RESPUESTA_ERROR_INTERNO } from './errorAplicacion';
import { obtenerIdSolicitud } from '../../infraestructura/logging/idSolicitud';
import { log, logError } from '../../infraestructura/logging/logger';

function leerPropiedad(error: unknown, clave: string): unknown {
  if (typeof error !== 'object' || error === null) return undefined;
  return Reflect.get(error, clave);
}

export function manejadorErrores(error: unknown, _req: Request, res: Response, _next: NextFunction) {
  void _next;
  const idSolicitud = obtenerIdSolicitud(res);

  const status = leerPropiedad(error, 'status') ?? leerPropiedad(error, 'statusCode');
  const type = leerPropiedad(error, 'type');

  if (type === 'entity.parse.failed') {
    log('warn', 'Cuerpo JSON malformado', { idSolicitud });
    res.status(400).json({
      error: 'Formato inválido',
      mensaje: 'El cuerpo de la petición debe ser JSON válido'
    });
    return;
  }

  if (status === 413 || type === 'entity.too.large') {
    res.status(413).json({
      error: 'Payload demasiado grande',
      mensaje: 'El cuerpo de la petición excede el tamaño permitido'
    });
    return;
  }

  if (error instanceof ErrorAplicacion) {
    res.status(error.estadoHttp).json({
      error: error.error,
      mensaje: error.message
    });
    return;
  }

  // Errores no esperados: el detalle solo va al log; el cliente recibe un
  // mensaje generico.
  logError('Error no controlado en request', error, { idSolicitud });
  res.status(500).json(RESPUESTA_ERROR_INTERNO);
}

export function manejadorRutaNoEncontrada(req: Request, res: Response) {
  res.status(404).json({
    error: 'Ruta no encontrada',
    mensaje: `No existe la ruta ${req.method} ${req.path}`
  });
}
