/**
 * Error estandar para respuestas controladas del API.
 *
 * `error` es el titulo corto que viaja en el envelope `{ error, mensaje }`.
 */
export class ErrorAplicacion extends Error {
  error: string;
  estadoHttp: number;

  constructor(error: string, mensaje: string, estadoHttp = 400) {
    super(mensaje);
    this.name = 'ErrorAplicacion';
    this.error = error;
    this.estadoHttp = estadoHttp;
  }
}

export const RESPUESTA_ERROR_INTERNO = {
  error: 'Error interno del servidor',
  mensaje: 'Ha ocurrido un error al procesar la solicitud'
} as const;

export function crearErrorInterno() {
  return new ErrorAplicacion(RESPUESTA_ERROR_INTERNO.error, RESPUESTA_ERROR_INTERNO.mensaje, 500);
}
