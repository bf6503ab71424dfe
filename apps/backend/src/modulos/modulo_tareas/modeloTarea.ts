/**
 * Modelo Tarea (coleccion configurable, `tareas` por defecto).
 *
 * El `_id` es el UUID de la tarea; no se usa ObjectId.
 */
import { Schema, model, models } from 'mongoose';
import type { Model } from 'mongoose';
import { configuracion } from '../../configuracion';
import { ESTADOS_TAREA, ESTADO_INICIAL } from '../../compartido/tipos/dominio';
import type { EstadoTarea, Tarea } from '../../compartido/tipos/dominio';
import type { CamposPersistidos, FiltroTareas } from './repositorioTareas';
import { LIMITE_DESCRIPCION, LIMITE_TITULO, MENSAJES, dentroDeLimite } from './validacionesTareas';

export type DocumentoTarea = {
  _id: string;
  titulo: string;
  descripcion: string;
  fecha: string;
  estado: EstadoTarea;
  creado_en: string;
  actualizado_en: string;
};

const TareaSchema = new Schema<DocumentoTarea>(
  {
    _id: { type: String, required: true },
    titulo: {
      type: String,
      required: true,
      trim: true,
      validate: { validator: (valor: string) => dentroDeLimite(valor, LIMITE_TITULO), message: MENSAJES.tituloLargo }
    },
    descripcion: {
      type: String,
      default: '',
      trim: true,
      validate: {
        validator: (valor: string) => dentroDeLimite(valor, LIMITE_DESCRIPCION),
        message: MENSAJES.descripcionLarga
      }
    },
    fecha: { type: String, required: true },
    estado: { type: String, enum: [...ESTADOS_TAREA], default: ESTADO_INICIAL, required: true },
    creado_en: { type: String, required: true, immutable: true },
    actualizado_en: { type: String, required: true }
  },
  { collection: configuracion.coleccionTareas, versionKey: false }
);

// Indice opcional para el filtro por estado; el contrato sigue siendo el de un recorrido.
TareaSchema.index({ estado: 1 });

export const ModeloTarea: Model<DocumentoTarea> = models.Tarea ?? model<DocumentoTarea>('Tarea', TareaSchema);

export function aDocumento(tarea: Tarea): DocumentoTarea {
  const { id, ...resto } = tarea;
  return { _id: id, ...resto };
}

export function aTarea(documento: DocumentoTarea): Tarea {
  return {
    id: documento._id,
    titulo: documento.titulo,
    descripcion: documento.descripcion ?? '',
    fecha: documento.fecha,
    estado: documento.estado,
    creado_en: documento.creado_en,
    actualizado_en: documento.actualizado_en
  };
}

/**
 * `$set` solo con las claves presentes; el resto del documento no se reescribe.
 */
export function consultaFusion(id: string, campos: CamposPersistidos) {
  return ModeloTarea.findOneAndUpdate({ _id: id }, { $set: campos }, { new: true, runValidators: true });
}

export function consultaEscaneo({ estado, limite }: FiltroTareas) {
  const consulta = ModeloTarea.find(estado ? { estado } : {});
  return limite ? consulta.limit(limite) : consulta;
}
