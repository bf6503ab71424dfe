/**
 * Endpoint de salud: proceso vivo y estado de la conexion a MongoDB.
 */
import { Router } from 'express';
import mongoose from 'mongoose';
import { ahoraIso8601 } from '../utilidades/fechas';
import type { Reloj } from '../utilidades/fechas';

const DESCRIPCIONES_CONEXION = ['desconectado', 'conectado', 'conectando', 'desconectando'];

export function describirConexion(estado: number): string {
  return DESCRIPCIONES_CONEXION[estado] ?? 'desconocido';
}

export function crearRutasSalud(reloj: Reloj) {
  const router = Router();

  router.get('/', (_req, res) => {
    const estado = Number(mongoose.connection.readyState);
    res.json({
      estado: 'ok',
      servicio: 'api-tareas',
      tiempoActivo: process.uptime(),
      timestamp: ahoraIso8601(reloj),
      db: { estado, descripcion: describirConexion(estado) }
    });
  });

  return router;
}
