/**
 * Repositorio de tareas sobre MongoDB (Mongoose).
 */
import type { DocumentoTarea } from './modeloTarea';
import { ModeloTarea, aDocumento, aTarea, consultaEscaneo, consultaFusion } from './modeloTarea';
import type { RepositorioTareas } from './repositorioTareas';

export function crearRepositorioTareasMongo(): RepositorioTareas {
  return {
    async obtener(id) {
      const documento = await ModeloTarea.findById(id).lean<DocumentoTarea | null>();
      return documento ? aTarea(documento) : null;
    },

    async insertar(tarea) {
      await ModeloTarea.create(aDocumento(tarea));
      return { ...tarea };
    },

    async actualizarCampos(id, campos) {
      const documento = await consultaFusion(id, campos).lean<DocumentoTarea | null>();
      return documento ? aTarea(documento) : null;
    },

    async eliminar(id) {
      await ModeloTarea.deleteOne({ _id: id });
    },

    async escanear(filtro) {
      const documentos = await consultaEscaneo(filtro).lean<DocumentoTarea[]>();
      return documentos.map(aTarea);
    }
  };
}
