/**
 * Validaciones de tareas.
 *
 * Contrato:
 * - Los campos se revisan en orden titulo, descripcion, fecha, estado; el
 *   primer error es el que se reporta.
 * - Al crear, `fecha` no puede ser anterior al momento actual. Al actualizar
 *   se acepta cualquier fecha valida (incluida una pasada).
 * - Los textos se guardan recortados; las claves desconocidas se descartan.
 */
import { z } from 'zod';
import { ESTADOS_TAREA, ESTADO_INICIAL } from '../../compartido/tipos/dominio';
import type { CamposActualizacionTarea, DatosNuevaTarea } from '../../compartido/tipos/dominio';
import { falloValidacion } from '../../compartido/tipos/resultado';
import type { Resultado } from '../../compartido/tipos/resultado';
import { formatearIso8601, parsearIso8601 } from '../../compartido/utilidades/fechas';
import { esObjetoPlano, validarConEsquema } from '../../compartido/validaciones/validar';

export const LIMITE_TITULO = 100;
export const LIMITE_DESCRIPCION = 500;
const CAMPOS_ACTUALIZABLES = ['titulo', 'descripcion', 'fecha', 'estado'] as const;

export const MENSAJES = {
  objeto: 'Los datos deben ser un objeto JSON válido',
  tituloObligatorio: "El campo 'titulo' es obligatorio y debe ser una cadena",
  tituloVacio: "El campo 'titulo' debe ser una cadena no vacía",
  tituloLargo: `El campo 'titulo' no puede superar los ${LIMITE_TITULO} caracteres`,
  descripcionTipo: "El campo 'descripcion' debe ser una cadena",
  descripcionLarga: `El campo 'descripcion' no puede superar los ${LIMITE_DESCRIPCION} caracteres`,
  fechaFormato: "El campo 'fecha' debe tener formato ISO 8601 (YYYY-MM-DDTHH:MM:SS)",
  fechaPasada: 'La fecha no puede ser anterior al momento actual',
  estado: `El campo 'estado' debe ser uno de: ${ESTADOS_TAREA.join(', ')}`,
  sinCampos: 'Debe proporcionar al menos un campo válido para actualizar'
} as const;

/** Cuenta caracteres (code points), no unidades UTF-16: un emoji vale 1. */
export function dentroDeLimite(texto: string, limite: number): boolean {
  return Array.from(texto).length <= limite;
}

function esquemaTitulo(mensajeTipo: string) {
  return z
    .string({ required_error: mensajeTipo, invalid_type_error: mensajeTipo })
    .trim()
    .min(1, mensajeTipo)
    .refine((valor) => dentroDeLimite(valor, LIMITE_TITULO), MENSAJES.tituloLargo);
}

const esquemaTextoDescripcion = z
  .string({ invalid_type_error: MENSAJES.descripcionTipo })
  .trim()
  .refine((valor) => dentroDeLimite(valor, LIMITE_DESCRIPCION), MENSAJES.descripcionLarga);

const esquemaEstado = z.enum(ESTADOS_TAREA, { errorMap: () => ({ message: MENSAJES.estado }) });

/**
 * `fecha` vacia (`undefined`, `null` o `''`) toma el momento actual.
 */
function esquemaFecha(ahora: Date, { permitirPasada }: { permitirPasada: boolean }) {
  return z.unknown().transform((valor, ctx) => {
    if (valor === undefined || valor === null || valor === '') return formatearIso8601(ahora);

    const fecha = typeof valor === 'string' ? parsearIso8601(valor) : null;
    if (!fecha) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: MENSAJES.fechaFormato });
      return z.NEVER;
    }
    if (!permitirPasada && fecha.getTime() < ahora.getTime()) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: MENSAJES.fechaPasada });
      return z.NEVER;
    }
    return formatearIso8601(fecha);
  });
}

function esquemaCrearTarea(ahora: Date) {
  return z.object(
    {
      titulo: esquemaTitulo(MENSAJES.tituloObligatorio),
      descripcion: esquemaTextoDescripcion.nullish().transform((valor) => valor ?? ''),
      fecha: esquemaFecha(ahora, { permitirPasada: false }),
      estado: esquemaEstado.default(ESTADO_INICIAL)
    },
    { required_error: MENSAJES.objeto, invalid_type_error: MENSAJES.objeto }
  );
}

function esquemaActualizarTarea(ahora: Date) {
  return z.object(
    {
      titulo: esquemaTitulo(MENSAJES.tituloVacio).optional(),
      // `null` explicito vacia la descripcion; ausente la deja intacta.
      descripcion: esquemaTextoDescripcion
        .nullable()
        .transform((valor) => valor ?? '')
        .optional(),
      fecha: esquemaFecha(ahora, { permitirPasada: true }).optional(),
      estado: esquemaEstado.optional()
    },
    { required_error: MENSAJES.objeto, invalid_type_error: MENSAJES.objeto }
  );
}

export function validarCreacionTarea(datos: unknown, ahora: Date = new Date()): Resultado<DatosNuevaTarea> {
  return validarConEsquema(esquemaCrearTarea(ahora), datos);
}

export function validarActualizacionTarea(
  datos: unknown,
  ahora: Date = new Date()
): Resultado<CamposActualizacionTarea> {
  if (!esObjetoPlano(datos)) return falloValidacion(MENSAJES.objeto);
  if (!CAMPOS_ACTUALIZABLES.some((campo) => campo in datos)) return falloValidacion(MENSAJES.sinCampos);
  return validarConEsquema(esquemaActualizarTarea(ahora), datos);
}
