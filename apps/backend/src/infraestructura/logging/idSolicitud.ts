/**
 * Identificador de solicitud para trazabilidad en logs.
 *
 * Se respeta `x-request-id` si el cliente lo envia con un formato razonable;
 * en otro caso se genera uno nuevo. Siempre se devuelve en la respuesta.
 */
import { randomUUID } from 'node:crypto';
import type { NextFunction, Request, Response } from 'express';
import { log } from './logger';

const CABECERA = 'x-request-id';
const PATRON_ID_EXTERNO = /^[\w.-]{1,64}$/;

export function obtenerIdSolicitud(res: Response): string {
  const valor: unknown = res.locals.idSolicitud;
  return typeof valor === 'string' ? valor : 'desconocido';
}

export function asignarIdSolicitud() {
  return (req: Request, res: Response, next: NextFunction) => {
    const externo = req.get(CABECERA);
    const idSolicitud = externo && PATRON_ID_EXTERNO.test(externo) ? externo : randomUUID();
    res.locals.idSolicitud = idSolicitud;
    res.setHeader(CABECERA, idSolicitud);
    log('info', 'Solicitud recibida', { idSolicitud, metodo: req.method, ruta: req.originalUrl });
    next();
  };
}
