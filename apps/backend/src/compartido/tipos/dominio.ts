/**
 * Tipos compartidos del dominio de tareas.
 */
export const ESTADOS_TAREA = ['PENDIENTE', 'EN_PROGRESO', 'COMPLETADA', 'CANCELADA'] as const;

export type EstadoTarea = (typeof ESTADOS_TAREA)[number];

export const ESTADO_INICIAL: EstadoTarea = 'PENDIENTE';

export function esEstadoTarea(valor: unknown): valor is EstadoTarea {
  return ESTADOS_TAREA.some((estado) => estado === valor);
}

/**
 * Registro persistido de una tarea. Las marcas de tiempo son ISO 8601 UTC
 * con precision de segundos (`2025-01-31T12:00:00Z`).
 */
export type Tarea = {
  id: string;
  titulo: string;
  descripcion: string;
  fecha: string;
  estado: EstadoTarea;
  creado_en: string;
  actualizado_en: string;
};

export type DatosNuevaTarea = Pick<Tarea, 'titulo' | 'descripcion' | 'fecha' | 'estado'>;

export type CamposActualizacionTarea = Partial<DatosNuevaTarea>;
