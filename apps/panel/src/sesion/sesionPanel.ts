/**
 * Contexto de la sesion interactiva: rol elegido y respuestas del examen abierto.
 *
 * Se crea al elegir rol. Cambiar de rol descarta las respuestas en curso;
 * abrir otro examen las reemplaza.
 */
import { crearSesionRespuestas } from '../modulos/modulo_respuestas/ensambladorEnvio';
import type { SesionRespuestas } from '../modulos/modulo_respuestas/ensambladorEnvio';

export const ROLES = ['admin', 'teacher', 'student'] as const;

export type RolPanel = (typeof ROLES)[number];

export type SeccionPanel = 'inicio' | 'examenes' | 'realizarExamen' | 'resultados' | 'usuarios' | 'estadisticas';

export const ETIQUETAS_SECCION: Record<SeccionPanel, string> = {
  inicio: 'Inicio',
  examenes: 'Exámenes',
  realizarExamen: 'Realizar examen',
  resultados: 'Resultados',
  usuarios: 'Usuarios',
  estadisticas: 'Estadísticas'
};

export const MENUS_POR_ROL: Record<RolPanel, readonly SeccionPanel[]> = {
  admin: ['inicio', 'examenes', 'resultados', 'usuarios', 'estadisticas'],
  teacher: ['inicio', 'examenes', 'resultados'],
  student: ['inicio', 'realizarExamen', 'resultados']
};

export function esRolPanel(valor: string): valor is RolPanel {
  return ROLES.some((rol) => rol === valor);
}

export function crearSesionPanel(rolInicial: RolPanel) {
  let rolActual = rolInicial;
  let respuestas: SesionRespuestas | null = null;

  function rol() {
    return rolActual;
  }

  function menu() {
    return MENUS_POR_ROL[rolActual];
  }

  function puedeAcceder(seccion: SeccionPanel) {
    return MENUS_POR_ROL[rolActual].includes(seccion);
  }

  function cambiarRol(nuevo: RolPanel) {
    rolActual = nuevo;
    respuestas = null;
  }

  /** Reabrir el mismo examen sin haberlo enviado conserva lo respondido. */
  function abrirExamen(examenId: number): SesionRespuestas {
    if (respuestas && respuestas.examenId === examenId && respuestas.estado() !== 'ENVIADA') {
      return respuestas;
    }
    respuestas = crearSesionRespuestas(examenId);
    return respuestas;
  }

  function respuestasActuales() {
    return respuestas;
  }

  return { rol, menu, puedeAcceder, cambiarRol, abrirExamen, respuestasActuales };
}

export type SesionPanel = ReturnType<typeof crearSesionPanel>;
